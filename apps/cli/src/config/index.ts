import { getConfigFromCli } from "./arg-parser.js";
import type { WeftConfig } from "./types.js";

let config: WeftConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
