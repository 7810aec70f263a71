export interface OutputStream {
  write(chunk: string): unknown;
}

export interface ProgressReporter {
  /** Replace the current progress line. */
  update(line: string): void;
  /** Print a message on its own line, closing any open progress line first. */
  note(line: string): void;
  /** Close the progress line, if one is open. */
  end(): void;
}

export class StreamProgress implements ProgressReporter {
  private open = false;

  constructor(private readonly stream: OutputStream) {}

  update(line: string): void {
    this.stream.write(`\r${line}`);
    this.open = true;
  }

  note(line: string): void {
    this.end();
    this.stream.write(`${line}\n`);
  }

  end(): void {
    if (this.open) {
      this.stream.write('\n');
      this.open = false;
    }
  }
}

export const silentProgress: ProgressReporter = {
  update: () => {},
  note: () => {},
  end: () => {},
};
