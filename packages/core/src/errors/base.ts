/**
 * Base error class for ziptree
 *
 * Every error thrown by the library carries the module it came from, the
 * operation that was running and a free-form context record.
 */
export abstract class ZiptreeError extends Error {
  /** Module where the error originated, e.g. `cursor.edits` */
  public readonly module: string;

  public readonly operation?: string | undefined;

  public readonly context?: Record<string, unknown> | undefined;

  public readonly timestamp: Date;

  constructor(
    message: string,
    module: string,
    operation?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    this.module = module;
    this.operation = operation;
    this.context = context;
    this.timestamp = new Date();

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Structured form used when the error is logged
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      module: this.module,
      operation: this.operation,
      context: this.context,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }
}
