import { nanoid } from "nanoid";

/**
 * Generates an operation ID for hook contexts.
 */
export function generateId(): string {
  return nanoid();
}
