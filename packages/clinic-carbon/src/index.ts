export { buildServer, CSV_FILENAME } from "./server/server.js";
export type { ServerOptions } from "./server/server.js";
export { runCalculation, ignoredAnaestheticQuantities } from "./calculation/runCalculation.js";
export type { CalculationReport, RunCalculationOptions } from "./calculation/runCalculation.js";
export { calculationRequestSchema, parseCalculationRequest, pickQuantities, toActivityInput } from "./calculation/request.js";
export type { CalculationRequest } from "./calculation/request.js";
export { loadFactorsFile } from "./calculation/factors.js";
export { loadConfig, DEFAULT_FACTORS_PATH } from "./config/config.js";
export type { AppConfig } from "./config/config.js";
export { mergeSettings, resolveSettings, DEFAULT_SETTINGS } from "./config/settings.js";
export type { Settings, SettingsOverrides } from "./config/settings.js";
