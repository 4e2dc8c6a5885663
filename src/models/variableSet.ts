/**
 * Fully resolved substitution variables, keyed by placeholder name
 */
export type VariableSet = Readonly<Record<string, string>>;

export type VariableOrigin = 'explicit' | 'environment' | 'config' | 'default';

/**
 * Variables together with the source each value came from
 */
export interface ResolvedVariables {
  values: VariableSet;
  origins: Readonly<Record<string, VariableOrigin>>;
}
