export type AccountErrorCode =
  | "AccountAlreadyExists"
  | "AccountNotInitialized"
  | "ExpiredDeadline"
  | "InvalidSignature"
  | "InvalidTxHash"
  | "PrecompileCallFailed"
  | "ExecutionFailed"
  | "ExecutionReverted"
  | "InvalidPayload"
  | "InvalidIdentity"
  | "ChainTypeAlreadyRegistered"
  | "ChainTypeNotRegistered"
  | "VmTypeMismatch"
  | "ImplementationAlreadyRegistered"
  | "ImplementationNotRegistered";

export class AccountError extends Error {
  readonly code: AccountErrorCode;

  constructor(code: AccountErrorCode, message?: string, options?: ErrorOptions) {
    super(message ?? code, options);
    this.name = "AccountError";
    this.code = code;
  }
}

/** Signature verification answered `false`; `strategy` names the implementation that asked. */
export class InvalidSignatureError extends AccountError {
  readonly strategy: string;

  constructor(strategy: string) {
    super("InvalidSignature", `invalid ${strategy} signature`);
    this.strategy = strategy;
  }
}

/** The target call reverted with a reason; `message` is that reason, untouched. */
export class ExecutionRevertedError extends AccountError {
  readonly reason: string;

  constructor(reason: string) {
    super("ExecutionReverted", reason);
    this.reason = reason;
  }
}

export const isAccountError = (
  err: unknown,
  code?: AccountErrorCode,
): err is AccountError =>
  err instanceof AccountError && (code === undefined || err.code === code);
