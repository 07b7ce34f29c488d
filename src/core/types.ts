/** Options every command receives. */
export interface GlobalArgs {
  verbose: boolean;
}
