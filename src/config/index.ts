/**
 * Centralized configuration for the text classification service.
 *
 * Provides typed access to environment variables and service settings:
 * - HTTP server port
 * - Model name and registry backend (local manifest or MLflow tracking server)
 * - Vectorizer artifact location
 * - Logging level and log file
 *
 * Loaded once at startup; an unknown registry backend aborts the process.
 */
import dotenv from "dotenv";

dotenv.config();

export type RegistryBackend = "file" | "mlflow";

export type ConfiguredLogLevel = "debug" | "info" | "warn" | "error";

function readRegistryBackend(raw: string | undefined): RegistryBackend {
  const value = (raw || "file").toLowerCase();

  if (value !== "file" && value !== "mlflow") {
    throw new Error(
      `REGISTRY_BACKEND must be "file" or "mlflow", got "${raw}".`
    );
  }

  return value;
}

function readLogLevel(raw: string | undefined): ConfiguredLogLevel {
  switch ((raw || "info").toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

const env = process.env.NODE_ENV || "development";

export const config = {
  env,

  port: Number(process.env.PORT || 5000),

  model: {
    name: process.env.MODEL_NAME || "my_model",
    vectorizerPath: process.env.VECTORIZER_PATH || "models/vectorizer.json",
  },

  registry: {
    backend: readRegistryBackend(process.env.REGISTRY_BACKEND),
    manifestPath: process.env.MODEL_REGISTRY_PATH || "models/registry.json",
    mlflow: {
      trackingUri: process.env.MLFLOW_TRACKING_URI || "http://localhost:5001",
      username: process.env.MLFLOW_TRACKING_USERNAME || undefined,
      password: process.env.MLFLOW_TRACKING_PASSWORD || undefined,
      timeoutMs: Number(process.env.MLFLOW_TIMEOUT_MS || 30000),
    },
  },

  observability: {
    logLevel: readLogLevel(process.env.LOG_LEVEL),
    logFile: env === "test" ? undefined : process.env.LOG_FILE || "logs/app.log",
  },
} as const;

export type AppConfig = typeof config;
