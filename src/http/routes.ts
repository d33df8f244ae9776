import { matchPathPattern } from "../policy/gate";
import { calendarOperations } from "./calendarRoutes";
import { mailOperations } from "./mailRoutes";
import type { Operation } from "./operations";

export const operations: readonly Operation[] = [...mailOperations, ...calendarOperations];

/** Case-sensitive lookup; the caller has already stripped one trailing slash. */
export function findOperation(
  method: string,
  path: string,
  table: readonly Operation[] = operations
): { operation: Operation; params: Record<string, string> } | null {
  for (const operation of table) {
    if (operation.method !== method) continue;
    const params = matchPathPattern(path, operation.pattern, { caseSensitive: true });
    if (params) return { operation, params };
  }
  return null;
}
