/**
 * Package version, reported by the CLI
 */
export const VERSION = "0.1.0";
