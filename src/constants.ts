export const CONFIG_DIR_NAME = ".devwrap" as const
export const CONFIG_FILENAME = "devwrap.config.json" as const

export const KUBECTL_DISCOVERY_TIMEOUT_MS = 15_000
export const TRACK_HEADER_RULE = "━".repeat(40)
