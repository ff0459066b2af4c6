export class ConversionError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = "ConversionError";
  }
}

export class SelectorError extends ConversionError {
  constructor(public readonly selector: string, cause: unknown) {
    super(`Invalid CSS selector "${selector}": ${cause instanceof Error ? cause.message : String(cause)}`, 400);
    this.name = "SelectorError";
  }
}

export class RenderError extends ConversionError {
  constructor(message: string) {
    super(message, 500);
    this.name = "RenderError";
  }
}

export class ConfigError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = "ConfigError";
  }
}
