import { loadConfig } from "@kgx3-regression/config";

export type { Config } from "@kgx3-regression/config";

export const config = loadConfig();
