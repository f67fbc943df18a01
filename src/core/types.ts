export type OutputFormat = "table" | "json";

/** Format names accepted on the command line. `structured` is a synonym of `json`. */
export type FormatFlag = OutputFormat | "structured";

export type Mode = "mock" | "live";

export interface GlobalArgs {
  mock?: boolean;
  real?: boolean;
  format?: FormatFlag;
  profile?: string;
  region?: string;
  verbose: boolean;
}

/** Options shared by every command, fixed for the lifetime of one invocation. */
export interface GlobalOptions {
  readonly mode: Mode;
  readonly format: OutputFormat;
  readonly profile?: string;
  readonly region?: string;
  readonly verbose: boolean;
}
