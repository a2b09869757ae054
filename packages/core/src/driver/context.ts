import { type AppBridge, createAppBridge } from "../bridge/appBridge.js";
import { type ResolvedTetherConfig, type TetherConfig, resolveConfig } from "../config.js";
import { type DispatchQueue, createDispatchQueue } from "../dispatch/dispatchQueue.js";
import { type ElementDirectory, createElementDirectory } from "../elements/directory.js";
import { type Logger, createLogger } from "../logger.js";
import type { ComponentFactory } from "../page/componentFactory.js";
import type { MarkupFactory } from "../page/types.js";
import {
  type PlatformClient,
  type PlatformTransport,
  createPlatformClient,
} from "../platform/platformClient.js";

/**
 * Everything a driver and its pages share. Built once per application and
 * handed to whoever needs it.
 */
export type TetherContext = Readonly<{
  config: ResolvedTetherConfig;
  logger: Logger;
  queue: DispatchQueue;
  bridge: AppBridge;
  platform: PlatformClient;
  directory: ElementDirectory;
  factory: ComponentFactory;
  createMarkup: MarkupFactory;
  now: () => number;
}>;

export type TetherContextOptions = Readonly<{
  transport: PlatformTransport;
  factory: ComponentFactory;
  createMarkup: MarkupFactory;
  config?: TetherConfig;
  /** Defaults to a console logger at `config.logLevel`. */
  logger?: Logger;
  now?: () => number;
}>;

export function createTetherContext(opts: TetherContextOptions): TetherContext {
  const config = resolveConfig(opts.config);
  const now = opts.now ?? Date.now;
  const logger = opts.logger ?? createLogger({ minSeverity: config.logLevel, now });

  const queue = createDispatchQueue({ capacity: config.queueCapacity, logger, now });
  const bridge = createAppBridge({ queue, logger });
  const platform = createPlatformClient({
    transport: opts.transport,
    timeoutMs: config.requestTimeoutMs,
    logger,
  });

  return Object.freeze({
    config,
    logger,
    queue,
    bridge,
    platform,
    directory: createElementDirectory(),
    factory: opts.factory,
    createMarkup: opts.createMarkup,
    now,
  });
}
