/** Input table is structurally unusable; the run aborts before any output is produced. */
export class EngineSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EngineSchemaError";
  }
}

export class ConfigError extends Error {
  field: string;

  constructor(field: string, message: string) {
    super(`Invalid config: "${field}" ${message}`);
    this.name = "ConfigError";
    this.field = field;
  }
}

export class EngineStageError extends Error {
  stage: string;

  constructor(stage: string, message: string, options?: { cause?: unknown }) {
    super(`[${stage}] ${message}`, options);
    this.name = "EngineStageError";
    this.stage = stage;
  }
}
