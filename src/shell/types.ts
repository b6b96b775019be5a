/**
 * Shell bootstrap types
 */

/** Options parsed from the command line; frozen for the bootstrap's lifetime. */
export type OptionMapping = Readonly<{
  config?: string;
  name?: string;
  sname?: string;
  script?: string;
  apps?: string;
}>;

export type ComponentSpec = {
  name: string;
  version?: string;
  loadOnly: boolean;
};

export type BootOutcome =
  | { component: string; status: 'started' }
  | { component: string; status: 'load_failed'; reason: string }
  | { component: string; status: 'start_failed'; reason: string };

export type BootReport = {
  outcomes: BootOutcome[];
  /** Number of settings written from the configuration file; undefined when there was none. */
  configApplied?: number;
};
