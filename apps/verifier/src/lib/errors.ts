export type ProverOperation =
  | "prepare_workspace"
  | "write_inputs"
  | "read_artifact";

/**
 * Failure inside the proving pipeline that is not a tool exit status.
 * `environment` means the deployment is broken (missing circuit, unwritable
 * work root); `internal` covers everything else.
 */
export class ProverError extends Error {
  readonly operation: ProverOperation;
  readonly kind: "environment" | "internal";
  readonly code?: string;

  constructor(args: {
    operation: ProverOperation;
    message: string;
    kind: "environment" | "internal";
    code?: string;
    cause?: unknown;
  }) {
    super(args.message, { cause: args.cause });
    this.name = "ProverError";
    this.operation = args.operation;
    this.kind = args.kind;
    this.code = args.code;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

/**
 * errno code of a Node system error, if any.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}
