/**
 * Build Errors
 *
 * Every failure in the content pipeline is fatal to the build. Each error
 * carries a `kind` discriminant and enough context (source file, slug, field
 * or output path) to locate the fix.
 */

export type BuildErrorKind =
  | "MissingFrontMatter"
  | "MalformedFrontMatter"
  | "InvalidDocument"
  | "UnknownLayout"
  | "OutputCollision"
  | "RenderFailure"
  | "IoFailure"
  | "InvalidConfig"
  | "InvalidTemplate";

export abstract class BuildError extends Error {
  abstract readonly kind: BuildErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingFrontMatterError extends BuildError {
  readonly kind = "MissingFrontMatter" as const;

  constructor(public readonly source: string) {
    super(`${source}: missing front matter (the file must start with a "---" line)`);
  }
}

export class MalformedFrontMatterError extends BuildError {
  readonly kind = "MalformedFrontMatter" as const;

  constructor(
    public readonly source: string,
    public readonly reason: string,
  ) {
    super(`${source}: malformed front matter: ${reason}`);
  }
}

export class InvalidDocumentError extends BuildError {
  readonly kind = "InvalidDocument" as const;

  constructor(
    public readonly source: string,
    public readonly field: string,
    public readonly reason: string,
  ) {
    super(`${source}: invalid "${field}": ${reason}`);
  }
}

export class UnknownLayoutError extends BuildError {
  readonly kind = "UnknownLayout" as const;

  constructor(
    public readonly name: string,
    public readonly slug: string,
  ) {
    super(`${slug}: unknown layout "${name}"`);
  }
}

export class OutputCollisionError extends BuildError {
  readonly kind = "OutputCollision" as const;

  constructor(
    public readonly path: string,
    public readonly origins: readonly string[],
  ) {
    super(`output collision at ${path} (${origins.join(", ")})`);
  }
}

export class RenderFailureError extends BuildError {
  readonly kind = "RenderFailure" as const;

  constructor(
    public readonly slug: string,
    cause: unknown,
  ) {
    super(`${slug}: render failed: ${describeCause(cause)}`, { cause });
  }
}

export class IoFailureError extends BuildError {
  readonly kind = "IoFailure" as const;

  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`${path}: ${describeCause(cause)}`, { cause });
  }
}

export class InvalidConfigError extends BuildError {
  readonly kind = "InvalidConfig" as const;

  constructor(public readonly issues: readonly string[]) {
    super(`Invalid inkwell config in package.json:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
  }
}

export class InvalidTemplateError extends BuildError {
  readonly kind = "InvalidTemplate" as const;

  constructor(
    public readonly name: string,
    public readonly path: string,
    public readonly reason: string,
  ) {
    super(`${path}: invalid template "${name}": ${reason}`);
  }
}

export function isBuildError(err: unknown): err is BuildError {
  return err instanceof BuildError;
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
