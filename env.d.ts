declare namespace NodeJS {
    export interface ProcessEnv {
        SERVER_PORT?: string;
        NODE_ENV?: 'development' | 'production' | 'test';
        CORS_ORIGINS?: string;
        TRUST_PROXY?: string;
        DB_HOST?: string;
        DB_PORT?: string;
        DB_USER?: string;
        DB_PASSWORD?: string;
        DB_NAME?: string;
        JWT_ACCESS_SECRET?: string;
        JWT_ACCESS_EXPIRATION_SECONDS?: string;
        REFRESH_TOKEN_EXPIRATION_MS?: string;
        REFRESH_RATE_LIMIT_MAX?: string;
        REFRESH_RATE_LIMIT_WINDOW_MS?: string;
        REFRESH_TOKEN_CLEANUP_ENABLED?: string;
        REFRESH_TOKEN_CLEANUP_INTERVAL_MS?: string;
        REFRESH_TOKEN_CLEANUP_GRACE_MS?: string;
        SECURITY_ALERT_TIMEOUT_MS?: string;
        COOKIE_SECURE?: string;
        SMTP_HOST?: string;
        SMTP_PORT?: string;
        SMTP_USER?: string;
        SMTP_PASS?: string;
        SMTP_FROM?: string;
    }
}
