// Verbose logging, off unless DEBUG_DATASET=1 (server) or VITE_DEBUG_DATASET=1 (browser)
const shouldLogDebug = (): boolean => {
  if (typeof process !== "undefined" && process.env?.DEBUG_DATASET === "1") return true;
  // import.meta.env only exists when vite bundles the code
  return import.meta.env?.VITE_DEBUG_DATASET === "1";
};

export const logDebug = (...args: unknown[]) => {
  if (shouldLogDebug()) {
    console.log(...args);
  }
};
