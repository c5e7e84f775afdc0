import type { ComponentType, HostContext } from './types';

/**
 * Re-entrancy guards of one registry.
 *
 * Pending-initialization is keyed by component type, pending-deinitialization
 * by activation handle. A flag set to false removes its key, so nothing stays
 * referenced once an operation completes. Sets keep insertion order, which for
 * the depth-first init/deinit walks is the current recursion chain.
 */
export class LifecycleState<TContext extends HostContext = HostContext> {
  private pendingInitialization: Set<ComponentType<TContext>> = new Set();
  private pendingDeinitialization: Set<string> = new Set();

  public isPendingInit(type: ComponentType<TContext>): boolean {
    return this.pendingInitialization.has(type);
  }

  public setPendingInit(type: ComponentType<TContext>, value: boolean): void {
    if (value) {
      this.pendingInitialization.add(type);
    } else {
      this.pendingInitialization.delete(type);
    }
  }

  public isPendingDeinit(handle: string): boolean {
    return this.pendingDeinitialization.has(handle);
  }

  public setPendingDeinit(handle: string, value: boolean): void {
    if (value) {
      this.pendingDeinitialization.add(handle);
    } else {
      this.pendingDeinitialization.delete(handle);
    }
  }

  /**
   * Types pending initialization from `type` onwards, i.e. the chain of
   * initializations that led back to `type`. Empty if `type` is not pending.
   */
  public pendingInitChainFrom(
    type: ComponentType<TContext>,
  ): ComponentType<TContext>[] {
    const pending = Array.from(this.pendingInitialization);
    const index = pending.indexOf(type);

    return index === -1 ? [] : pending.slice(index);
  }

  /**
   * Handles pending deinitialization from `handle` onwards
   */
  public pendingDeinitChainFrom(handle: string): string[] {
    const pending = Array.from(this.pendingDeinitialization);
    const index = pending.indexOf(handle);

    return index === -1 ? [] : pending.slice(index);
  }
}
