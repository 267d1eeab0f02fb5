// src/config/env.ts
import * as path from "path";
import * as fs from "fs";
import { config } from "dotenv";

export function loadEnv() {
    const nodeEnv = process.env.NODE_ENV || "development"; // "development" | "production" | "test"
    const file = path.resolve(process.cwd(), `.env.${nodeEnv}`);
    if (fs.existsSync(file)) {
        // values already present in process.env win over the file
        config({ path: file });
    }
}

export enum envKeys {
    SERVER_PORT = "SERVER_PORT",
    NODE_ENV = "NODE_ENV",
    CORS_ORIGINS = "CORS_ORIGINS",
    TRUST_PROXY = "TRUST_PROXY",
    DB_HOST = "DB_HOST",
    DB_PORT = "DB_PORT",
    DB_USER = "DB_USER",
    DB_PASSWORD = "DB_PASSWORD",
    DB_NAME = "DB_NAME",
    JWT_ACCESS_SECRET = "JWT_ACCESS_SECRET",
    JWT_ACCESS_EXPIRATION_SECONDS = "JWT_ACCESS_EXPIRATION_SECONDS",
    REFRESH_TOKEN_EXPIRATION_MS = "REFRESH_TOKEN_EXPIRATION_MS",
    REFRESH_RATE_LIMIT_MAX = "REFRESH_RATE_LIMIT_MAX",
    REFRESH_RATE_LIMIT_WINDOW_MS = "REFRESH_RATE_LIMIT_WINDOW_MS",
    REFRESH_TOKEN_CLEANUP_ENABLED = "REFRESH_TOKEN_CLEANUP_ENABLED",
    REFRESH_TOKEN_CLEANUP_INTERVAL_MS = "REFRESH_TOKEN_CLEANUP_INTERVAL_MS",
    REFRESH_TOKEN_CLEANUP_GRACE_MS = "REFRESH_TOKEN_CLEANUP_GRACE_MS",
    SECURITY_ALERT_TIMEOUT_MS = "SECURITY_ALERT_TIMEOUT_MS",
    COOKIE_SECURE = "COOKIE_SECURE",
    SMTP_HOST = "SMTP_HOST",
    SMTP_PORT = "SMTP_PORT",
    SMTP_USER = "SMTP_USER",
    SMTP_PASS = "SMTP_PASS",
    SMTP_FROM = "SMTP_FROM",
}

type envKeysType = `${envKeys}`;

export function env(key: envKeysType, fallback?: string): string {
    const v = process.env[key];
    if ((v === undefined || v === "") && fallback === undefined) {
        throw new Error(`Missing env ${key}`);
    }
    return v === undefined || v === "" ? fallback ?? "" : v;
}

export class ConfigError extends Error {
    constructor(key: envKeysType, value: string) {
        super(`Invalid value for ${key}: "${value}"`);
        this.name = "ConfigError";
    }
}

function positiveInt(key: envKeysType, fallback: number): number {
    const raw = env(key, String(fallback));
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) throw new ConfigError(key, raw);
    return n;
}

function nonNegativeInt(key: envKeysType, fallback: number): number {
    const raw = env(key, String(fallback));
    const n = Number(raw);
    if (!Number.isInteger(n) || n < 0) throw new ConfigError(key, raw);
    return n;
}

function flag(key: envKeysType, fallback: boolean): boolean {
    const raw = env(key, String(fallback)).toLowerCase();
    if (raw === "true" || raw === "1") return true;
    if (raw === "false" || raw === "0") return false;
    throw new ConfigError(key, raw);
}

export const APP_CONFIG = Symbol("APP_CONFIG");

export interface AppConfig {
    nodeEnv: string;
    port: number;
    corsOrigins: string[];
    /** Reverse-proxy hops in front of the app; 0 uses the socket peer as client IP. */
    trustProxyHops: number;
    jwtAccessSecret: string;
    accessTokenTtlSeconds: number;
    refreshTokenTtlMs: number;
    refreshRateLimit: { max: number; windowMs: number };
    cleanup: { enabled: boolean; intervalMs: number; graceMs: number };
    alertTimeoutMs: number;
    cookieSecure: boolean;
    database: { host: string; port: number; username: string; password: string; database: string };
    smtp: { host: string; port: number; user: string; pass: string; from: string };
}

export function appConfig(): AppConfig {
    return {
        nodeEnv: env("NODE_ENV", "development"),
        port: positiveInt("SERVER_PORT", 8080),
        corsOrigins: env("CORS_ORIGINS", "http://localhost:5173")
            .split(",")
            .map((o) => o.trim())
            .filter(Boolean),
        trustProxyHops: nonNegativeInt("TRUST_PROXY", 0),
        jwtAccessSecret: env("JWT_ACCESS_SECRET"),
        accessTokenTtlSeconds: positiveInt("JWT_ACCESS_EXPIRATION_SECONDS", 900),          // 15m
        refreshTokenTtlMs: positiveInt("REFRESH_TOKEN_EXPIRATION_MS", 604_800_000),         // 7d
        refreshRateLimit: {
            max: positiveInt("REFRESH_RATE_LIMIT_MAX", 10),
            windowMs: positiveInt("REFRESH_RATE_LIMIT_WINDOW_MS", 60_000),
        },
        cleanup: {
            enabled: flag("REFRESH_TOKEN_CLEANUP_ENABLED", true),
            intervalMs: positiveInt("REFRESH_TOKEN_CLEANUP_INTERVAL_MS", 86_400_000),       // daily
            graceMs: positiveInt("REFRESH_TOKEN_CLEANUP_GRACE_MS", 2_592_000_000),          // 30d
        },
        alertTimeoutMs: positiveInt("SECURITY_ALERT_TIMEOUT_MS", 5_000),
        cookieSecure: flag("COOKIE_SECURE", true),
        database: {
            host: env("DB_HOST", "127.0.0.1"),
            port: positiveInt("DB_PORT", 3306),
            username: env("DB_USER", "store"),
            password: env("DB_PASSWORD", ""),
            database: env("DB_NAME", "store"),
        },
        smtp: {
            host: env("SMTP_HOST", ""),
            port: positiveInt("SMTP_PORT", 465),
            user: env("SMTP_USER", ""),
            pass: env("SMTP_PASS", ""),
            from: env("SMTP_FROM", "security@store.local"),
        },
    };
}
