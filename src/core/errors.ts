/**
 * armgraph: Error Hierarchy
 *
 *   ArmGraphError (base)
 *   ├── ConfigurationError (invariant violated while finalizing a configuration)
 *   │   └── ArtifactClassificationError
 *   ├── CompilationError (a builder failed while emitting descriptors)
 *   ├── DeploymentError (submission or upload failure)
 *   └── OperationCancelledError
 */

export type ArmGraphErrorCode =
  | "CONFIGURATION_INVALID"
  | "ARTIFACT_UNCLASSIFIABLE"
  | "COMPILATION_FAILED"
  | "DEPLOYMENT_FAILED"
  | "OPERATION_CANCELLED";

export type ArmGraphErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

/**
 * Base error class for all armgraph errors.
 */
export class ArmGraphError extends Error {
  /** Error code for programmatic handling */
  readonly code: ArmGraphErrorCode;

  /** Additional context about the error */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: ArmGraphErrorCode, options?: ArmGraphErrorOptions) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ArmGraphError";
    this.code = code;
    this.context = options?.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ConfigurationError extends ArmGraphError {
  constructor(message: string, options?: ArmGraphErrorOptions & { code?: "CONFIGURATION_INVALID" | "ARTIFACT_UNCLASSIFIABLE" }) {
    super(message, options?.code ?? "CONFIGURATION_INVALID", options);
    this.name = "ConfigurationError";
  }
}

export class ArtifactClassificationError extends ConfigurationError {
  readonly path: string;

  constructor(path: string, options?: ArmGraphErrorOptions) {
    super(`Path '${path}' must either be a folder to be zipped, or an existing zip.`, {
      ...options,
      code: "ARTIFACT_UNCLASSIFIABLE",
      context: { path, ...options?.context },
    });
    this.name = "ArtifactClassificationError";
    this.path = path;
  }
}

export class CompilationError extends ArmGraphError {
  readonly resourceName: string;

  constructor(resourceName: string, options?: ArmGraphErrorOptions) {
    super(`Failed to build resources for "${resourceName}": ${formatError(options?.cause)}`, "COMPILATION_FAILED", {
      ...options,
      context: { resourceName, ...options?.context },
    });
    this.name = "CompilationError";
    this.resourceName = resourceName;
  }
}

export class DeploymentError extends ArmGraphError {
  readonly resourceName: string;

  constructor(resourceName: string, message: string, options?: ArmGraphErrorOptions) {
    super(message, "DEPLOYMENT_FAILED", { ...options, context: { resourceName, ...options?.context } });
    this.name = "DeploymentError";
    this.resourceName = resourceName;
  }
}

export class OperationCancelledError extends ArmGraphError {
  constructor(operation: string, options?: ArmGraphErrorOptions) {
    super(`${operation} was cancelled`, "OPERATION_CANCELLED", options);
    this.name = "OperationCancelledError";
  }
}

/** Check whether a thrown value belongs to the armgraph hierarchy. */
export function isArmGraphError(error: unknown): error is ArmGraphError {
  return error instanceof ArmGraphError;
}

/** Render any thrown value as a single message string. */
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (error === undefined) return "Unknown error";
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
