/**
 * Console logging with the package prefix.
 * `debug` output is gated on the `debug` config flag.
 */

import { config } from "./config.js";

const PREFIX = "[optikit]";

export const log = {
  warn(message: string, ...details: unknown[]): void {
    console.warn(`${PREFIX} ${message}`, ...details);
  },

  debug(message: string, ...details: unknown[]): void {
    if (config.get("debug")) {
      console.debug(`${PREFIX} ${message}`, ...details);
    }
  },
};
