/**
 * Where command output goes. `out` is the data stream (stdout); `err` carries
 * status and error lines (stderr) so piped output stays clean.
 */
export interface Output {
  out(line: string): void;
  err(line: string): void;
}

export const processOutput: Output = {
  out(line) {
    process.stdout.write(line + "\n");
  },
  err(line) {
    process.stderr.write(line + "\n");
  },
};

export interface BufferedOutput extends Output {
  readonly stdout: string[];
  readonly stderr: string[];
}

export function createBufferedOutput(): BufferedOutput {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    out(line) {
      stdout.push(line);
    },
    err(line) {
      stderr.push(line);
    },
  };
}
