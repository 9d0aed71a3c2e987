import { HOST_EVENTS } from '../constants/index.js';
import type { PackageManagerHost, PackageOperation, PoolCreateEvent } from './ports/host.js';
import { resolveRewriterConfig } from './config.js';
import { DependencyRewriter, type DependencyRewriterOptions } from './rewrite/dependency-rewriter.js';
import { logger } from '../utils/logger.js';

/**
 * Payload the host passes along with each event the plugin listens to
 */
export interface HostEventPayloads {
  [HOST_EVENTS.PRE_POOL_CREATE]: PoolCreateEvent;
  [HOST_EVENTS.PRE_PACKAGE_INSTALL]: PackageOperation;
  [HOST_EVENTS.PRE_PACKAGE_UPDATE]: PackageOperation;
  [HOST_EVENTS.POST_AUTOLOAD_DUMP]: void;
}

export type HostEventName = keyof HostEventPayloads;

export type HostEventHandler<K extends HostEventName> = (payload: HostEventPayloads[K]) => Promise<void>;

/**
 * One handler per event the plugin listens to
 */
export type HostEventHandlers = { [K in HostEventName]: HostEventHandler<K> };

/**
 * Whatever event system the host offers, reduced to registration.
 * The host awaits each handler before moving on.
 */
export interface HookRegistrar {
  register<K extends HostEventName>(event: K, handler: HostEventHandler<K>): void;
}

export interface PluginActivationOptions extends Omit<DependencyRewriterOptions, 'composerFile'> {
  env?: Record<string, string | undefined>;
  cwd?: string;
}

/**
 * Adapter between the host's plugin lifecycle and DependencyRewriter.
 * Events that arrive while the plugin is inactive are ignored.
 */
export class DependencyRewriterPlugin {
  private rewriter: DependencyRewriter | null = null;

  activate(host: PackageManagerHost, options: PluginActivationOptions): DependencyRewriter {
    const { env, cwd, ...rewriterOptions } = options;
    const config = resolveRewriterConfig(env ?? process.env, cwd ?? process.cwd());
    logger.setLevel(config.logLevel);

    this.rewriter = new DependencyRewriter(host, { ...rewriterOptions, composerFile: config.composerFile });
    logger.debug(`Dependency rewriter activated for ${config.composerFile}`);
    return this.rewriter;
  }

  deactivate(): void {
    this.rewriter = null;
  }

  /**
   * The plugin keeps nothing on disk, so removing it only drops the run state.
   */
  uninstall(): void {
    this.deactivate();
  }

  isActive(): boolean {
    return this.rewriter !== null;
  }

  getSubscribedEvents(): HostEventHandlers {
    return {
      [HOST_EVENTS.PRE_POOL_CREATE]: async event => {
        await this.active(HOST_EVENTS.PRE_POOL_CREATE)?.onPoolCreate(event);
      },
      [HOST_EVENTS.PRE_PACKAGE_INSTALL]: async operation => {
        await this.active(HOST_EVENTS.PRE_PACKAGE_INSTALL)?.onPackageOperation(operation);
      },
      [HOST_EVENTS.PRE_PACKAGE_UPDATE]: async operation => {
        await this.active(HOST_EVENTS.PRE_PACKAGE_UPDATE)?.onPackageOperation(operation);
      },
      [HOST_EVENTS.POST_AUTOLOAD_DUMP]: async () => {
        await this.active(HOST_EVENTS.POST_AUTOLOAD_DUMP)?.onPostInstall();
      }
    };
  }

  subscribe(registrar: HookRegistrar): void {
    const handlers = this.getSubscribedEvents();
    registrar.register(HOST_EVENTS.PRE_POOL_CREATE, handlers[HOST_EVENTS.PRE_POOL_CREATE]);
    registrar.register(HOST_EVENTS.PRE_PACKAGE_INSTALL, handlers[HOST_EVENTS.PRE_PACKAGE_INSTALL]);
    registrar.register(HOST_EVENTS.PRE_PACKAGE_UPDATE, handlers[HOST_EVENTS.PRE_PACKAGE_UPDATE]);
    registrar.register(HOST_EVENTS.POST_AUTOLOAD_DUMP, handlers[HOST_EVENTS.POST_AUTOLOAD_DUMP]);
  }

  private active(event: HostEventName): DependencyRewriter | null {
    if (this.rewriter === null) {
      logger.debug(`Ignoring ${event}; plugin is not active`);
    }
    return this.rewriter;
  }
}
