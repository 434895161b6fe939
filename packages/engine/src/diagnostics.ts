export const ENGINE_DIAGNOSTIC_CODES = [
  // Configuration
  "FFI1001",
  "FFI1002",
  // Shape rejection
  "FFI2001",
  "FFI2002",
  "FFI2003",
  "FFI2004",
  "FFI2005",
  // Declaration text
  "FFI3001",
] as const;

export type EngineDiagnosticCode = (typeof ENGINE_DIAGNOSTIC_CODES)[number];

export type EngineDiagnosticDomain = "config" | "shape" | "parse" | "other";

const KNOWN_CODES: ReadonlySet<string> = new Set(ENGINE_DIAGNOSTIC_CODES);

export function isEngineDiagnosticCode(code: string): code is EngineDiagnosticCode {
  return KNOWN_CODES.has(code);
}

export function assertEngineDiagnosticCode(code: string): asserts code is EngineDiagnosticCode {
  if (!isEngineDiagnosticCode(code)) {
    throw new Error(`Unknown engine diagnostic code: ${code}`);
  }
}

export function engineDiagnosticDomain(code: string): EngineDiagnosticDomain {
  if (!isEngineDiagnosticCode(code)) return "other";
  switch (code.charAt(3)) {
    case "1":
      return "config";
    case "2":
      return "shape";
    case "3":
      return "parse";
    default:
      return "other";
  }
}

/** 1-based position of a declaration in the library it was captured from. */
export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
};

export const UNKNOWN_LOCATION: SourceLocation = Object.freeze({ file: "<unknown>", line: 0, column: 0 });

export function formatLocation(location: SourceLocation): string {
  return `${location.file}:${location.line}:${location.column}`;
}

export class FfiError extends Error {
  readonly code: EngineDiagnosticCode;
  readonly location?: SourceLocation;

  constructor(code: EngineDiagnosticCode, message: string, location?: SourceLocation) {
    super(location ? `${message} (at ${formatLocation(location)})` : message);
    this.code = code;
    this.location = location;
    this.name = "FfiError";
  }
}

export function fail(code: EngineDiagnosticCode, message: string, location: SourceLocation | undefined): never {
  throw new FfiError(code, message, location);
}
