// Path: src/commands/types.ts
// Type definitions for Commander.js command options

/**
 * Options for the 'plan' command
 */
export interface PlanCommandOptions {
  config?: string;
  json?: boolean;
}

/**
 * Options for the 'start' command
 */
export interface StartCommandOptions {
  config?: string;
  validate?: boolean;
  verbose?: boolean;
}
