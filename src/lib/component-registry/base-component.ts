import type { LoggerService } from '../logger/logger-service';
import { ComponentContextError } from './errors';
import type { HostContext } from './types';

/**
 * Method the registry calls right after construction to inject the host context
 */
export const bindHostContext = Symbol('bindHostContext');

/**
 * Anything that wants the host context injected after construction
 */
export interface ContextAware<TContext extends HostContext = HostContext> {
  [bindHostContext](context: TContext): void;
}

export function isContextAware<TContext extends HostContext>(
  instance: object,
): instance is ContextAware<TContext> {
  return (
    bindHostContext in instance &&
    typeof instance[bindHostContext] === 'function'
  );
}

/**
 * Optional base class for registry-managed components
 *
 * Gives the component its host context and a logger scoped to the component
 * name. Both are available from `init()` onwards; reading them inside the
 * constructor throws, unless the constructor received the context itself and
 * passed it to `super()`.
 *
 * Lifecycle capabilities are opt-in: implement `Initializable`, `Unloadable`,
 * `Reloadable` or `EventSubscriber` as needed.
 *
 * @example
 * ```typescript
 * class ConfigComponent extends BaseComponent<MyHost> implements Initializable, Reloadable {
 *   static readonly componentName = 'config';
 *   private values: Record<string, string> = {};
 *
 *   init() {
 *     this.values = loadConfig(this.context.name);
 *     this.logger.info('Configuration loaded');
 *   }
 *
 *   reload() {
 *     this.values = loadConfig(this.context.name);
 *   }
 * }
 * ```
 */
export abstract class BaseComponent<TContext extends HostContext = HostContext>
  implements ContextAware<TContext>
{
  private boundContext: TContext | null = null;
  private scopedLogger: LoggerService | null = null;

  constructor(context?: TContext) {
    if (context) {
      this[bindHostContext](context);
    }
  }

  /**
   * Host context this component was initialized for
   *
   * @throws {ComponentContextError} If read before the registry injected it
   */
  protected get context(): TContext {
    if (!this.boundContext) {
      throw new ComponentContextError({ componentName: this.getComponentName() });
    }

    return this.boundContext;
  }

  /**
   * Logger scoped to the host name and this component
   */
  protected get logger(): LoggerService {
    if (!this.scopedLogger) {
      this.scopedLogger = this.context.logger
        .service(this.context.name)
        .entity(this.getComponentName());
    }

    return this.scopedLogger;
  }

  public [bindHostContext](context: TContext): void {
    if (this.boundContext !== context) {
      this.boundContext = context;
      this.scopedLogger = null;
    }
  }

  /**
   * Whether the host context has been injected
   */
  public hasContext(): boolean {
    return this.boundContext !== null;
  }

  /**
   * Display name: the static `componentName` of the class, or the class name
   */
  public getComponentName(): string {
    const type: unknown = this.constructor;

    if (
      typeof type === 'function' &&
      'componentName' in type &&
      typeof type.componentName === 'string'
    ) {
      return type.componentName;
    }

    return this.constructor.name;
  }
}
