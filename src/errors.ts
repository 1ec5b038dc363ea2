function formatLocation(line: number | undefined): string {
  return line !== undefined ? ` at line ${line}` : '';
}

export class MalformedInputError extends Error {
  public readonly line?: number;
  public readonly column?: number;
  public readonly code = 'E_MALFORMED_INPUT';

  constructor(message: string, line?: number, column?: number) {
    super(`${message}${formatLocation(line)}`);
    this.name = 'MalformedInputError';
    this.line = line;
    this.column = column;
  }
}

/**
 * A construct outside the supported subset. Translation records these as
 * diagnostics and keeps going; they are never thrown out of `transpile`.
 */
export class UnsupportedConstructError extends Error {
  public readonly construct: string;
  public readonly line?: number;
  public readonly code = 'E_UNSUPPORTED_CONSTRUCT';

  constructor(construct: string, line: number | undefined, message: string) {
    super(`${message}${formatLocation(line)}`);
    this.name = 'UnsupportedConstructError';
    this.construct = construct;
    this.line = line;
  }
}

export class CollaboratorError extends Error {
  public readonly collaborator: string;
  public readonly diagnostics: string;
  public readonly code = 'E_COLLABORATOR';

  constructor(collaborator: string, message: string, diagnostics = '') {
    super(message);
    this.name = 'CollaboratorError';
    this.collaborator = collaborator;
    this.diagnostics = diagnostics;
  }
}

export class ConfigError extends Error {
  public readonly path: string;
  public readonly code = 'E_CONFIG';

  constructor(path: string, message: string) {
    super(`${message} (${path})`);
    this.name = 'ConfigError';
    this.path = path;
  }
}
