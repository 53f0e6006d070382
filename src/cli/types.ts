/**
 * Options shared by every command, set on the root program.
 */
export interface GlobalOptions {
  verbose?: boolean;
  silent?: boolean;
}
