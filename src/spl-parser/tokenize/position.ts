// A Position describes the location of a character of SPL input.
export class Position {
  file: string | null; // filename, null if not read from a file
  line: number; // 1-based line number; 0 if line unknown
  col: number; // 1-based column number; 0 if column unknown

  constructor(file: string | null, line: number, col: number) {
    this.file = file;
    this.line = line;
    this.col = col;
  }

  // isValid reports whether the position refers to a real location.
  isValid(): boolean {
    return this.line > 0;
  }

  // filename returns the name of the file containing this position.
  filename(): string {
    if (this.file !== null) {
      return this.file;
    }
    return '<input>';
  }

  copy(): Position {
    return new Position(this.file, this.line, this.col);
  }

  toString(): string {
    const file = this.filename();
    if (this.line > 0) {
      if (this.col > 0) {
        return `${file}:${this.line}:${this.col}`;
      }
      return `${file}:${this.line}`;
    }
    return file;
  }
}
