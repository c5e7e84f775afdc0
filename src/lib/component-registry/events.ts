import { componentRegistryErrCodes } from './errors';
import type { ComponentRegistryErrCode } from './errors';

export interface ComponentRegistryEventMap {
  'component:registered': { name: string };
  'component:unregistered': { name: string; wasActive: boolean };
  'component:initialized': { name: string; handle: string };
  'component:initialization-failed': {
    name: string;
    error: Error;
    code: ComponentRegistryErrCode | 'unknown_error';
  };
  'component:deinitialized': { name: string; handle: string };
  'component:deinitialization-failed': { name: string; error: Error };
  'component:reloaded': { name: string };
  'component:reload-failed': { name: string; error: Error };
  'registry:bound': { hostName: string };
  'registry:unbound': { hostName: string; deinitializedCount: number };
}

export type ComponentRegistryEventName = keyof ComponentRegistryEventMap;

export type ComponentRegistryEmit = <K extends ComponentRegistryEventName>(
  event: K,
  data: ComponentRegistryEventMap[K],
) => void;

/**
 * Typed emitters for every registry event
 */
export class ComponentRegistryEvents {
  constructor(private readonly emit: ComponentRegistryEmit) {}

  public componentRegistered(name: string): void {
    this.emit('component:registered', { name });
  }

  public componentUnregistered(name: string, wasActive: boolean): void {
    this.emit('component:unregistered', { name, wasActive });
  }

  public componentInitialized(name: string, handle: string): void {
    this.emit('component:initialized', { name, handle });
  }

  public componentInitializationFailed(name: string, error: Error): void {
    this.emit('component:initialization-failed', {
      name,
      error,
      code:
        'errCode' in error && typeof error.errCode === 'string'
          ? this.toErrCode(error.errCode)
          : 'unknown_error',
    });
  }

  public componentDeinitialized(name: string, handle: string): void {
    this.emit('component:deinitialized', { name, handle });
  }

  public componentDeinitializationFailed(name: string, error: Error): void {
    this.emit('component:deinitialization-failed', { name, error });
  }

  public componentReloaded(name: string): void {
    this.emit('component:reloaded', { name });
  }

  public componentReloadFailed(name: string, error: Error): void {
    this.emit('component:reload-failed', { name, error });
  }

  public registryBound(hostName: string): void {
    this.emit('registry:bound', { hostName });
  }

  public registryUnbound(hostName: string, deinitializedCount: number): void {
    this.emit('registry:unbound', { hostName, deinitializedCount });
  }

  private toErrCode(
    errCode: string,
  ): ComponentRegistryErrCode | 'unknown_error' {
    return (
      Object.values(componentRegistryErrCodes).find(
        (code) => code === errCode,
      ) ?? 'unknown_error'
    );
  }
}
