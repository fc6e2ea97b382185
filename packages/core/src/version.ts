// Injected at build time via esbuild --define
declare const __PAGEWRIGHT_VERSION__: string | undefined;

/**
 * Get the current pagewright version ("dev" when running from source).
 */
export function getCurrentVersion(): string {
  return typeof __PAGEWRIGHT_VERSION__ !== "undefined" ? __PAGEWRIGHT_VERSION__ : "dev";
}
