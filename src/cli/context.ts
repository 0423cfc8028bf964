import { createAppContext, type AppContext } from "../bootstrap";
import { loadConfig } from "../core/config";
import { createLogger, loggerOptionsFromConfig } from "../core/logger";

export type ContextProvider = () => AppContext;

/** Builds the context on first use so `--help` touches neither config nor disk. */
export function lazyContext(): ContextProvider {
  let context: AppContext | null = null;
  return () => {
    if (!context) {
      const config = loadConfig();
      context = createAppContext(config, createLogger(loggerOptionsFromConfig(config)));
    }
    return context;
  };
}
