export * from "./core/config";
export * from "./core/pypirc";
export * from "./core/command";
export * from "./core/packaging";
export * from "./core/webhooks";
export * from "./core/deploy";
export * from "./core/readiness";
export * from "./core/logger";
export * from "./types/errors";
