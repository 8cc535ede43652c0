export const DEFAULT_HOST = "0.0.0.0";
export const DEFAULT_PORT = 16395;

export const HTTP_READ_TIMEOUT_MS = 30_000;
export const HTTP_WRITE_TIMEOUT_MS = 300_000;
export const HTTP_IDLE_TIMEOUT_MS = 60_000;
export const PROXY_RESPONSE_HEADER_TIMEOUT_MS = 30_000;
export const WEBSOCKET_HANDSHAKE_TIMEOUT_MS = 30_000;

export const MAX_WORKFLOW_BYTES = 5 * 1024 * 1024;
export const MAX_PACKAGE_BYTES = 200 * 1024 * 1024;
export const MAX_EXTRACTED_FILE_BYTES = 500 * 1024 * 1024;
export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const UPLOAD_SWEEP_INTERVAL_MS = 5 * 60_000;
export const UPLOAD_TTL_MS = 30 * 60_000;
export const UPLOAD_DIRECTORY_NAME = "kdeps-uploads";

export const SESSION_COOKIE_NAME = "kdeps_session_id";
export const SESSION_COOKIE_MAX_AGE_SECONDS = 3600;

export const MANAGEMENT_TOKEN_ENV = "KDEPS_MANAGEMENT_TOKEN";
export const BIND_HOST_ENV = "KDEPS_BIND_HOST";
export const DEBUG_ENV = "DEBUG";

export const MANAGEMENT_BASE_PATH = "/_kdeps";
export const CONTAINER_WORKFLOW_PATH = "/app/workflow.yaml";

export const RUNTIME_EVENT_BUFFER_SIZE = 500;
