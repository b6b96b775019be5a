/**
 * devshell shared constants
 * Hard-coded names and limits are kept here.
 */

// Registered unit names
export const UNIT_NAMES = {
  FRONT_END: 'user',
  SHELL_AGENT: 'shell_agent',
} as const;

// Recorded originating roles of units
export const UNIT_ROLES = {
  FRONT_END: 'front_end',
  COMPONENT_MASTER: 'component_master',
  COMPONENT: 'component',
  SHELL_AGENT: 'shell_agent',
} as const;

// Log handler ids
export const LOG_HANDLERS = {
  TTY: 'tty',
  SIMPLE: 'simple',
} as const;

// Front-end takeover limits
export const TAKEOVER = {
  POLL_INTERVAL_MS: 100,
  REGISTRATION_TIMEOUT_MS: 3000,
  HANDLER_REMOVAL_ATTEMPTS: 3,
} as const;

// Distribution
export const DISTRIBUTION = {
  PORT_MAPPER_HOST: '127.0.0.1',
  PORT_MAPPER_PORT: 4369,
  PROBE_TIMEOUT_MS: 500,
  UNNAMED_NODE: 'nonode@nohost',
} as const;

// Project layout
export const PROJECT_FILES = {
  PROJECT_CONFIG: 'devshell.config.json',
  COMPONENT_MANIFEST: 'component.json',
  BUILD_DIR: '_build',
  DEFAULT_PROFILE: 'default',
} as const;

// Sentinel for an explicitly disabled script
export const SCRIPT_DISABLED = 'none';

// Separators accepted in --apps
export const APPS_SEPARATORS = /[ ,:]+/;
