import { basename } from "node:path";
import type { MessagePort } from "node:worker_threads";
import {
  type ComponentFactory,
  type Driver,
  type DriverCallbacks,
  type Logger,
  type MarkupFactory,
  type TetherConfig,
  type TetherContext,
  createDriver,
  createLogger,
  createTetherContext,
  mergeConfig,
  resolveConfig,
} from "@tether/core";
import { readEnvConfig } from "./config/env.js";
import { createStreamSink } from "./logging/streamSink.js";
import { type MessagePortLink, createMessagePortLink } from "./transport/messagePortTransport.js";

export { readEnvConfig } from "./config/env.js";
export { createStreamSink } from "./logging/streamSink.js";
export {
  createMessagePortLink,
  type LinkTargets,
  type MessagePortLink,
  type MessagePortLinkOptions,
} from "./transport/messagePortTransport.js";
export {
  AppMessageSchema,
  NativeMessageSchema,
  type AppMessage,
  type NativeMessage,
} from "./transport/protocol.js";

export type CreateNodeDriverOptions = Readonly<{
  /** Port connected to the native host. */
  port: MessagePort;
  factory: ComponentFactory;
  createMarkup: MarkupFactory;
  /** Explicit settings; these win over the environment. */
  config?: TetherConfig;
  callbacks?: DriverCallbacks;
  /** Environment to read TETHER_* settings from. Defaults to process.env. */
  env?: NodeJS.ProcessEnv;
  /** Defaults to a stderr logger at the configured level. */
  logger?: Logger;
  /** Working directory used to derive the fallback app name. */
  cwd?: string;
}>;

export type NodeDriver = Readonly<{
  driver: Driver;
  context: TetherContext;
  link: MessagePortLink;
}>;

/**
 * Wire a driver to a native host reachable through `port`.
 */
export function createNodeDriver(opts: CreateNodeDriverOptions): NodeDriver {
  const dirName = basename(opts.cwd ?? process.cwd());
  const config = resolveConfig(
    mergeConfig(
      { appName: dirName.length > 0 ? dirName : undefined },
      readEnvConfig(opts.env ?? process.env),
      opts.config ?? {},
    ),
  );
  const logger =
    opts.logger ?? createLogger({ minSeverity: config.logLevel, sink: createStreamSink() });

  const link = createMessagePortLink(opts.port, { logger });
  const context = createTetherContext({
    transport: link.transport,
    factory: opts.factory,
    createMarkup: opts.createMarkup,
    config,
    logger,
  });
  link.attach({ bridge: context.bridge, platform: context.platform });

  const driver = createDriver(context, opts.callbacks);
  return Object.freeze({ driver, context, link });
}
