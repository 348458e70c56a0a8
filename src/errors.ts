/**
 * Fatal error taxonomy for tokenfill.
 *
 * Every error raised on purpose by the engine extends `TokenfillError` and
 * carries the process exit code the CLI uses when it aborts the run.
 */

export class TokenfillError extends Error {
  constructor(
    message: string,
    readonly exitCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or contradictory options, unusable output paths, missing mandatory variable files. */
export class ConfigError extends TokenfillError {
  constructor(message: string) {
    super(message, 2);
  }
}

/** An explicitly named template file or directory does not exist. */
export class NotFoundError extends TokenfillError {
  constructor(readonly path: string) {
    super(`No such file or directory: ${path}`, 3);
  }
}

/**
 * A referenced token has no value while missing tokens are fatal.
 * `chain` lists every name looked up, ending with the one that was absent.
 */
export class MissingVariableError extends TokenfillError {
  constructor(
    readonly token: string,
    readonly chain: readonly string[] = [token],
  ) {
    super(
      chain.length > 1
        ? `Variable not set: ${chain[chain.length - 1]} (referenced by \${${token}} via ${chain.join(' -> ')})`
        : `Variable not set: \${${token}}`,
      4,
    );
  }
}

/** An indirection chain revisits a name or grows past the configured depth. */
export class CyclicReferenceError extends TokenfillError {
  constructor(
    readonly token: string,
    readonly chain: readonly string[],
  ) {
    super(`Cyclic variable reference for \${${token}}: ${chain.join(' -> ')}`, 5);
  }
}
