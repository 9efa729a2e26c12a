export class StoreError extends Error {
  constructor(
    message: string,
    public readonly constraint?: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UniqueViolationError extends StoreError {}

export class ForeignKeyViolationError extends StoreError {}

export class RowPolicyViolationError extends StoreError {}

const SQLSTATE_ERRORS: Record<string, new (message: string, constraint?: string) => StoreError> = {
  "23505": UniqueViolationError,
  "23503": ForeignKeyViolationError,
  "42501": RowPolicyViolationError,
};

function readStringField(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

export function translateStoreError(error: unknown): unknown {
  if (!error || typeof error !== "object") {
    return error;
  }
  const code = readStringField(error, "code");
  const ErrorType = code ? SQLSTATE_ERRORS[code] : undefined;
  if (!ErrorType) {
    return error;
  }
  return new ErrorType(readStringField(error, "message") ?? "store constraint violated", readStringField(error, "constraint"));
}
