/**
 * Options accepted on the command line.
 */
export interface CliArguments {
  /**
   * Explicit git revision range. `undefined` when not supplied, in which case the range is inferred.
   */
  range?: string;
}
