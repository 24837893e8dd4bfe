/**
 * Terminal detection used to decide whether a spinner is appropriate
 */

/**
 * Check if running in a PowerShell host environment
 *
 * PowerShell renders ora's cursor control as CLIXML progress records,
 * so the spinner stays off there.
 */
export function isPowerShellHost(): boolean {
  if (process.env.PSModulePath) {
    return true;
  }

  if (process.env.POWERSHELL_DISTRIBUTION_CHANNEL) {
    return true;
  }

  const comSpec = process.env.ComSpec || '';
  return comSpec.toLowerCase().includes('powershell');
}

/**
 * All three standard streams must be TTYs for a spinner to make sense
 */
export function isInteractiveTTY(): boolean {
  return (
    process.stdin.isTTY === true &&
    process.stdout.isTTY === true &&
    process.stderr.isTTY === true
  );
}
