import { BUILTIN_EVENT_CLASSES, EventClass } from "../types/pipeline";

export function eventClassLabel(code: number): string {
  const builtin = BUILTIN_EVENT_CLASSES.find((c) => c.code === code);
  return builtin ? builtin.label : `class ${code}`;
}

/**
 * Classes to scan: the one selected, or every built-in class in order
 */
export function resolveEventClasses(focusIdx?: number): EventClass[] {
  if (focusIdx === undefined) {
    return [...BUILTIN_EVENT_CLASSES];
  }
  return [{ code: focusIdx, label: eventClassLabel(focusIdx) }];
}
