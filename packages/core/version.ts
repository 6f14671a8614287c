export const RALG_VERSION = "0.1.0"
