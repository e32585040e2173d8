import { vi } from "vitest";

/**
 * Silence and capture `console.warn` for the duration of a test.
 * Call `mockRestore()` on the result in `afterEach`.
 */
export function spyOnWarnings() {
  return vi.spyOn(console, "warn").mockImplementation(() => {});
}
