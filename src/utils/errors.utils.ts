/**
 * Raised when a rename would overwrite a different file
 */
export class RenameCollisionError extends Error {
  constructor(
    public readonly from: string,
    public readonly to: string
  ) {
    super(`Cannot rename '${from}' to '${to}': a different file already has that name`);
    this.name = "RenameCollisionError";
  }
}

/**
 * Raised for unreadable or invalid configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
