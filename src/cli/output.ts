/**
 * Where command output goes. Results are written with `log` (stdout),
 * failures with `error` (stderr).
 */
export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  log(line) {
    console.log(line);
  },
  error(line) {
    console.error(line);
  },
};
