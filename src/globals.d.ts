declare namespace NodeJS {
  export interface ProcessEnv {
    PORT?: string
    KUBERNETES_API_URL?: string
    KUBERNETES_SERVICE_HOST?: string
    KUBERNETES_SERVICE_PORT?: string
    KUBERNETES_TOKEN_PATH?: string
    KUBERNETES_CA_PATH?: string
    METRICS_COMPONENT?: string
    SNAPSHOT_METRICS_ENABLED?: string
    SNAPSHOT_KINDS?: string
    SNAPSHOT_REFRESH_INTERVAL_MS?: string
    LOG_LEVEL?: string
    GCP_LOGGING_ENABLED?: string
    TRACING_EXPORTER?: string
    TRACING_SAMPLE_RATE?: string
  }
}
