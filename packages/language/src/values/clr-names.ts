// Language-independent identifiers and dotted type/namespace names

const IDENTIFIER = /^[\p{L}\p{Nl}_][\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}\p{Cf}]*$/u;

export function isValidIdentifier(value: string): boolean {
  return IDENTIFIER.test(value);
}

/**
 * Number of dot-separated components when every component is a valid identifier,
 * otherwise null.
 */
export function clrNameComponentCount(value: string): number | null {
  const components = value.split(".");
  return components.every(isValidIdentifier) ? components.length : null;
}

export interface TaskName {
  name: string;
  /** Null when the task name is not namespace-qualified. */
  namespace: string | null;
}

/** Splits `Namespace.TaskName`; null when any component is not an identifier. */
export function parseTaskName(fullName: string): TaskName | null {
  if (clrNameComponentCount(fullName) === null) return null;
  const dot = fullName.lastIndexOf(".");
  return dot < 0
    ? { name: fullName, namespace: null }
    : { name: fullName.slice(dot + 1), namespace: fullName.slice(0, dot) };
}
