/** Release version reported by the CLI and the tfsync_info metric. */
export const VERSION = '0.1.0'
