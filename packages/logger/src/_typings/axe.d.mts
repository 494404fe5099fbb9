//axe ships plain JavaScript; this covers the part of its API the workspace calls.
declare module "axe" {
  type LoggerMethod = (...args: unknown[]) => Promise<void>;

  interface AxeOptions {
    level?: string;
    levels?: string[];
    silent?: boolean;
    appInfo?: boolean;
    showStack?: boolean;
    name?: string | boolean;
    logger?: object;
  }

  class Axe {
    constructor(config?: AxeOptions);
    trace: LoggerMethod;
    debug: LoggerMethod;
    info: LoggerMethod;
    warn: LoggerMethod;
    error: LoggerMethod;
    fatal: LoggerMethod;
    log: LoggerMethod;
    setLevel(level: string): void;
    setName(name: string): void;
  }

  export default Axe;
}
