export class IncludeManager {
  private readonly headers: string[] = [];
  private readonly seen = new Set<string>();
  private readonly builtinModule: string;
  private readonly headerExtension: string;

  constructor(builtinModule = 'Arduino', headerExtension = '.h') {
    this.builtinModule = builtinModule;
    this.headerExtension = headerExtension;
  }

  /**
   * Record the header for `from <module> import ...`.
   *
   * Dotted modules (`lib.CheapStepper`) use their last segment. The built-in
   * module contributes nothing.
   *
   * @returns The header name, or `undefined` when the import adds no include
   */
  addFromImport(module: string): string | undefined {
    const segments = module.split('.').filter(Boolean);
    const last = segments[segments.length - 1];
    if (last === undefined || module === this.builtinModule || last === this.builtinModule) {
      return undefined;
    }
    const header = `${last}${this.headerExtension}`;
    this.addHeader(header);
    return header;
  }

  addHeader(header: string): void {
    if (this.seen.has(header)) return;
    this.seen.add(header);
    this.headers.push(header);
  }

  /** Header names in first-seen order */
  headerNames(): string[] {
    return [...this.headers];
  }
}
