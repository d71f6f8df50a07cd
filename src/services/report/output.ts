// Report output sinks

/**
 * Receives one report line at a time, without a trailing newline
 */
export type LineWriter = (line: string) => void;

/**
 * Writes report lines to stdout
 */
export const stdoutWriter: LineWriter = line => {
  process.stdout.write(`${line}\n`);
};

/**
 * Discards every line
 */
export const nullWriter: LineWriter = () => undefined;

/**
 * Collects lines in memory
 */
export class BufferedOutput {
  readonly lines: string[] = [];

  readonly write: LineWriter = line => {
    this.lines.push(line);
  };

  toString(): string {
    return this.lines.map(line => `${line}\n`).join('');
  }
}
