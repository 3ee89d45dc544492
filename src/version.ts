/** Package version reported by `docr --version` and the tool server */
export const VERSION = '0.1.0';
