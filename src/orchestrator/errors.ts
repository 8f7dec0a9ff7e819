export class ImageNotFoundError extends Error {
  readonly name = "ImageNotFoundError" as const;
  constructor(image: string) {
    super(`Image ${image} not found`);
  }
}

export class HostNotFoundError extends Error {
  readonly name = "HostNotFoundError" as const;
  constructor(host: string) {
    super(`Server ${host} not found`);
  }
}

/** Thrown when the remote build step fails. The image keeps its previous build. */
export class BuildError extends Error {
  readonly name = "BuildError" as const;
  constructor(image: string, host: string, cause: unknown) {
    super(`Failed to build image ${image} on server ${host}: ${describeError(cause)}`, { cause });
  }
}

/** Thrown when a host session cannot be opened. Fatal at startup. */
export class SessionError extends Error {
  readonly name = "SessionError" as const;
  constructor(host: string, cause: unknown) {
    super(`Failed to connect to server ${host}: ${describeError(cause)}`, { cause });
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Thrown for image or file names that are not a single safe path segment. */
export class InvalidNameError extends Error {
  readonly name = "InvalidNameError" as const;
  constructor(kind: "image" | "file", value: string) {
    super(`Invalid ${kind} name: ${value}`);
  }
}

/** The `code` of a Node.js system error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
