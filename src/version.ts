/**
 * Gate version, shown in reports and the CLI.
 */
export const VERSION = '0.1.0';
