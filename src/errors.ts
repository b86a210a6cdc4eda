/**
 * Purpose: Declare the error taxonomy shared by the tokenizer, parser, and domain evaluators.
 * Intent: Give every failure a stable code so the orchestrator can collapse it to `ERR` and keep the diagnostic.
 */

export type LexErrorCode = "LP_LEX_DANGLING_REF" | "LP_LEX_DANGLING_CURRENCY" | "LP_LEX_UNEXPECTED_CHAR";

export type ParseErrorCode =
  | "LP_PARSE_UNEXPECTED_TOKEN"
  | "LP_PARSE_UNEXPECTED_END"
  | "LP_PARSE_EXPECTED_TOKEN"
  | "LP_PARSE_UNKNOWN_FUNCTION"
  | "LP_PARSE_NO_RESOLVER"
  | "LP_PARSE_BAD_REFERENCE"
  | "LP_PARSE_SELF_REFERENCE"
  | "LP_PARSE_FORWARD_REFERENCE"
  | "LP_PARSE_UNRESOLVED_REFERENCE";

export type DomainErrorCode =
  | "LP_DOMAIN_INVALID_CIDR"
  | "LP_DOMAIN_INVALID_ADDRESS"
  | "LP_DOMAIN_INVALID_PREFIX"
  | "LP_DOMAIN_INVALID_MASK"
  | "LP_DOMAIN_SPLIT_INFEASIBLE"
  | "LP_DOMAIN_TOO_MANY_SUBNETS"
  | "LP_DOMAIN_UNKNOWN_ZONE"
  | "LP_DOMAIN_INVALID_DATETIME"
  | "LP_DOMAIN_INVALID_NUMBER"
  | "LP_DOMAIN_DIVISION_BY_ZERO"
  | "LP_DOMAIN_UNRECOGNIZED";

export type LinepadErrorCode = LexErrorCode | ParseErrorCode | DomainErrorCode | "LP_CONFIG_INVALID";

export class LinepadError extends Error {
  readonly code: LinepadErrorCode;

  constructor(code: LinepadErrorCode, message: string) {
    super(message);
    this.name = "LinepadError";
    this.code = code;
  }
}

export class LexError extends LinepadError {
  readonly pos: number;

  constructor(code: LexErrorCode, message: string, pos: number) {
    super(code, message);
    this.name = "LexError";
    this.pos = pos;
  }
}

export class ParseError extends LinepadError {
  constructor(code: ParseErrorCode, message: string) {
    super(code, message);
    this.name = "ParseError";
  }
}

/** A domain pre-filter matched, but the deeper parse or computation failed. */
export class DomainError extends LinepadError {
  readonly domain: string;

  constructor(domain: string, code: DomainErrorCode, message: string) {
    super(code, message);
    this.name = "DomainError";
    this.domain = domain;
  }
}

export class ConfigError extends LinepadError {
  constructor(message: string) {
    super("LP_CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export interface ErrorInfo {
  code: string;
  message: string;
}

export function errorInfo(err: unknown): ErrorInfo {
  if (err instanceof LinepadError) return { code: err.code, message: err.message };
  if (err instanceof Error) return { code: "LP_INTERNAL", message: err.message };
  return { code: "LP_INTERNAL", message: String(err) };
}
