declare namespace NodeJS {
  interface ProcessEnv {
    LOG_LEVEL?: string
    DEV_LOG?: string
    EVIDENCE_SUBGRAPH_ENDPOINT?: string
    EVIDENCE_STATEMENT_URL?: string
    EVIDENCE_BROWSER_TARGET?: string
    EVIDENCE_TIMEOUT_SECONDS?: string
  }
}
