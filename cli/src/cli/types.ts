/**
 * Context passed to command handlers
 */
export interface CommandContext {
  jsonOutput: boolean;
  verbose: boolean;
}
