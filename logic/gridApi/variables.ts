export interface VariableInfo {
  readonly id: string;
  readonly description: string;
}

/**
 * Common Fingrid electricity variables, in menu order
 */
export const COMMON_VARIABLES: ReadonlyArray<VariableInfo> = Object.freeze([
  { id: '124', description: 'Production (Hydro)' },
  { id: '100', description: 'Production (Wind)' },
  { id: '101', description: 'Production (Thermal)' },
  { id: '102', description: 'Production (Solar)' },
  { id: '74', description: 'Electricity generation' },
  { id: '172', description: 'Load forecast' },
  { id: '191', description: 'Reserved capacity' },
  { id: '200', description: 'Cross-border flow' },
]);

/**
 * Describe a variable id, falling back to a generic label
 */
export function describeVariable(variableId: string): string {
  return COMMON_VARIABLES.find((variable) => variable.id === variableId)?.description ?? `Variable ${variableId}`;
}

/**
 * Lines for the "available variables" listing, ids padded to 3 chars
 */
export function formatVariableList(variables: ReadonlyArray<VariableInfo> = COMMON_VARIABLES): string[] {
  const rule = '-'.repeat(50);
  const entries = variables.map(({ id, description }) => `  ID ${id.padEnd(3)} - ${description}`);
  return ['Available Electricity Variables:', rule, ...entries, rule];
}
