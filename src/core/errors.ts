export type HopscopeErrorCode =
  | "malformed_hop_line"
  | "probe_count_mismatch"
  | "unresolved_host"
  | "invalid_argument"
  | "unknown_dialect"
  | "unknown_target"
  | "invalid_probe_settings"
  | "store_format";

export class HopscopeError extends Error {
  readonly code: HopscopeErrorCode;

  constructor(code: HopscopeErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = new.target.name;
  }
}

export class MalformedHopLineError extends HopscopeError {
  readonly line: string;

  constructor(line: string, reason = "Hop line does not start with a hop index") {
    super("malformed_hop_line", `${reason}: "${line}"`);
    this.line = line;
  }
}

export class ProbeCountMismatchError extends HopscopeError {
  readonly line: string;
  readonly expected: number;
  readonly accounted: number;

  constructor(line: string, expected: number, accounted: number) {
    super(
      "probe_count_mismatch",
      `Expected ${expected} probe outcomes but found ${accounted}: "${line}"`,
    );
    this.line = line;
    this.expected = expected;
    this.accounted = accounted;
  }
}

export class UnresolvedHostError extends HopscopeError {
  readonly target: string;

  constructor(target: string, banner: string) {
    super("unresolved_host", `Name or service not known for ${target}: ${banner}`);
    this.target = target;
  }
}

export class InvalidArgumentError extends HopscopeError {
  constructor(line: string) {
    super("invalid_argument", `Probe tool rejected its arguments: ${line}`);
  }
}

export class UnknownDialectError extends HopscopeError {
  readonly dialect: string;

  constructor(dialect: string) {
    super("unknown_dialect", `Unknown output dialect: "${dialect}"`);
    this.dialect = dialect;
  }
}

export class UnknownTargetError extends HopscopeError {
  readonly target: string;

  constructor(target: string) {
    super("unknown_target", `No runs recorded for target: ${target}`);
    this.target = target;
  }
}

export class InvalidProbeSettingsError extends HopscopeError {
  constructor(message: string) {
    super("invalid_probe_settings", message);
  }
}

export class StoreFormatError extends HopscopeError {
  constructor(message: string) {
    super("store_format", message);
  }
}
