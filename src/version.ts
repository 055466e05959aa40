// Keep in sync with package.json.
export const VERSION = "1.0.0";
