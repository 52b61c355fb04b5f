// A Names hands out the labels and temporary names of one compilation.
// The code generator and the inliner of a compilation share one Names,
// so that no label or fresh variable is ever issued twice.
export class Names {
  private labels = 0;
  private temps = 0;

  // label returns a fresh label: prefix followed by a four-digit serial.
  label(prefix: string): string {
    this.labels++;
    return `${prefix}${String(this.labels).padStart(4, '0')}`;
  }

  // relabel returns a fresh label with the same prefix as label.
  relabel(label: string): string {
    return this.label(label.replace(/\d+$/, ''));
  }

  // temp returns a fresh variable name for base. Source names are lower
  // case, so the upper-case kind letter keeps it distinct from all of them.
  temp(kind: 'P' | 'L' | 'M', base: string): string {
    this.temps++;
    return `${kind}${this.temps}${base}`;
  }
}
