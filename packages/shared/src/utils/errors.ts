export class TickscopeError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'TickscopeError';
    this.code = code;
  }
}

/** The counter source cannot be opened at all. Disables one sampler. */
export class SourceUnavailableError extends TickscopeError {
  public readonly source: string;

  constructor(source: string, reason?: string) {
    super(
      reason ? `Source unavailable: ${source} (${reason})` : `Source unavailable: ${source}`,
      'SOURCE_UNAVAILABLE',
    );
    this.name = 'SourceUnavailableError';
    this.source = source;
  }
}

/** A row or field could not be parsed this tick. */
export class ParseError extends TickscopeError {
  public readonly source: string;

  constructor(source: string, detail: string) {
    super(`Failed to parse ${source}: ${detail}`, 'PARSE_FAILURE');
    this.name = 'ParseError';
    this.source = source;
  }
}

/** A process or device went away between discovery and the detail read. */
export class EntityVanishedError extends TickscopeError {
  public readonly entity: string;

  constructor(entity: string) {
    super(`Entity vanished: ${entity}`, 'ENTITY_VANISHED');
    this.name = 'EntityVanishedError';
    this.entity = entity;
  }
}

export class ConfigValidationError extends TickscopeError {
  public readonly errors: string[];

  constructor(errors: string[]) {
    super(`Configuration validation failed:\n${errors.join('\n')}`, 'CONFIG_VALIDATION_ERROR');
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}
