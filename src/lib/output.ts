/** Line sink for progress output (stdout) and error reports (stderr) */
export interface Output {
  log(line?: string): void;
  error(line?: string): void;
}

export const consoleOutput: Output = {
  log: (line = '') => console.log(line),
  error: (line = '') => console.error(line),
};
