/**
 * Test components for ComponentRegistry unit and integration tests
 *
 * Most components extend `RecordingComponent`, which appends
 * `<component-name>:<step>` to the host's `calls` list so tests can assert
 * the exact order of lifecycle hooks across components.
 */

import { Logger } from '../logger';
import type { ArraySink } from '../logger/sinks';
import { BaseComponent } from './base-component';
import type { Initializable, Reloadable, Unloadable } from './capabilities';
import { HostEventBus } from './host-event-bus';
import type {
  ComponentType,
  EventHandlerMap,
  EventSubscriber,
  HostContext,
} from './types';

// cspell:ignore Reloadable

export interface TestHost extends HostContext {
  readonly events: HostEventBus;

  /** Lifecycle hooks in call order, as `<component>:<step>` */
  readonly calls: string[];
}

export function createTestHost(name = 'test-plugin'): {
  host: TestHost;
  logger: Logger;
  arraySink: ArraySink;
} {
  const { logger, arraySink } = Logger.createTestOptimizedLogger();

  return {
    host: { name, logger, events: new HostEventBus(), calls: [] },
    logger,
    arraySink,
  };
}

/**
 * Records init/unload calls on the host
 */
export abstract class RecordingComponent
  extends BaseComponent<TestHost>
  implements Initializable, Unloadable
{
  public initCount = 0;
  public unloadCount = 0;

  public init(): void {
    this.initCount++;
    this.record('init');
  }

  public unload(): void {
    this.unloadCount++;
    this.record('unload');
  }

  protected record(step: string): void {
    this.context.calls.push(`${this.getComponentName()}:${step}`);
  }
}

/**
 * Reloadable configuration store, no dependencies
 */
export class ConfigComponent extends RecordingComponent implements Reloadable {
  static readonly componentName = 'config';

  public values: Record<string, string> = {};
  public reloadCount = 0;

  public init(): void {
    super.init();
    this.values = { prefix: '!' };
  }

  public reload(): void {
    this.reloadCount++;
    this.record('reload');
  }
}

/**
 * Command handling that depends on config and listens to host events
 */
export class CommandsComponent
  extends RecordingComponent
  implements EventSubscriber
{
  static readonly componentName = 'commands';
  static readonly dependsOn = [ConfigComponent];

  public received: unknown[] = [];

  public getEventHandlers(): EventHandlerMap {
    return {
      command: (payload) => {
        this.received.push(payload);
      },
    };
  }
}

/**
 * Dependency shared by several components
 */
export class SharedComponent extends RecordingComponent implements Reloadable {
  static readonly componentName = 'shared';

  public reload(): void {
    this.record('reload');
  }
}

export class ReloadingDependentComponent
  extends RecordingComponent
  implements Reloadable
{
  static readonly componentName = 'reloading-dependent';
  static readonly dependsOn = [SharedComponent];

  public reload(): void {
    this.record('reload');
  }
}

export class FirstDependentComponent extends RecordingComponent {
  static readonly componentName = 'first-dependent';
  static readonly dependsOn = [SharedComponent];
}

export class SecondDependentComponent extends RecordingComponent {
  static readonly componentName = 'second-dependent';
  static readonly dependsOn = [SharedComponent];
}

/**
 * Top of a chain: top -> middle -> shared
 */
export class MiddleComponent extends RecordingComponent {
  static readonly componentName = 'middle';
  static readonly dependsOn = [SharedComponent];
}

export class TopComponent extends RecordingComponent implements Reloadable {
  static readonly componentName = 'top';
  static readonly dependsOn = [MiddleComponent];

  public reload(): void {
    this.record('reload');
  }
}

/**
 * Two components depending on each other
 */
export class CycleAComponent extends RecordingComponent {
  static readonly componentName = 'cycle-a';

  static get dependsOn(): ComponentType<TestHost>[] {
    return [CycleBComponent];
  }
}

export class CycleBComponent extends RecordingComponent {
  static readonly componentName = 'cycle-b';

  static get dependsOn(): ComponentType<TestHost>[] {
    return [CycleAComponent];
  }
}

export class SelfDependentComponent extends RecordingComponent {
  static readonly componentName = 'self-dependent';

  static get dependsOn(): ComponentType<TestHost>[] {
    return [SelfDependentComponent];
  }
}

/**
 * Built through its static factory
 */
export class FactoryComponent extends RecordingComponent {
  static readonly componentName = 'factory';

  public createdBy = 'constructor';
  public hostName: string | null = null;

  static create(context: TestHost): FactoryComponent {
    const instance = new FactoryComponent();
    instance.createdBy = 'factory';
    instance.hostName = context.name;

    return instance;
  }
}

/**
 * Receives the host context through its constructor
 */
export class ContextConstructorComponent extends RecordingComponent {
  static readonly componentName = 'context-constructor';

  public readonly hostNameAtConstruction: string;

  constructor(context: TestHost) {
    super(context);
    this.hostNameAtConstruction = context.name;
  }
}

/**
 * Not derived from BaseComponent, constructed without arguments
 */
export class PlainComponent implements Initializable {
  public initCount = 0;

  public init(): void {
    this.initCount++;
  }
}

/**
 * Declares two constructor parameters, which no construction path supplies
 */
export class TwoParameterComponent {
  constructor(_context: TestHost, _label: string) {}
}

/**
 * Static factory that returns an instance of another class
 */
export class MismatchedFactoryComponent {
  static create(): object {
    return new PlainComponent();
  }
}

export class FailingConstructorComponent {
  constructor() {
    throw new Error('constructor exploded');
  }
}

export class FailingInitComponent extends RecordingComponent {
  static readonly componentName = 'failing-init';

  public init(): void {
    super.init();
    throw new Error('init exploded');
  }
}

export class DependsOnFailingInitComponent extends RecordingComponent {
  static readonly componentName = 'depends-on-failing-init';
  static readonly dependsOn = [FailingInitComponent];
}

export class FailingUnloadComponent extends RecordingComponent {
  static readonly componentName = 'failing-unload';

  public unload(): void {
    super.unload();
    throw new Error('unload exploded');
  }
}

export class SecondFailingUnloadComponent extends RecordingComponent {
  static readonly componentName = 'second-failing-unload';

  public unload(): void {
    super.unload();
    throw new Error('unload exploded again');
  }
}

/**
 * Depends on config, fails to unload
 */
export class FailingDependentComponent extends RecordingComponent {
  static readonly componentName = 'failing-dependent';
  static readonly dependsOn = [ConfigComponent];

  public unload(): void {
    super.unload();
    throw new Error('unload exploded');
  }
}

/**
 * Top of a chain: failing-top -> middle -> shared, fails to unload
 */
export class FailingTopComponent extends RecordingComponent {
  static readonly componentName = 'failing-top';
  static readonly dependsOn = [MiddleComponent];

  public unload(): void {
    super.unload();
    throw new Error('unload exploded');
  }
}

export class FailingReloadComponent
  extends RecordingComponent
  implements Reloadable
{
  static readonly componentName = 'failing-reload';

  public reload(): void {
    this.record('reload');
    throw new Error('reload exploded');
  }
}

/**
 * Reads its context from the constructor, before it is injected
 */
export class EagerContextComponent extends BaseComponent<TestHost> {
  static readonly componentName = 'eager-context';

  public readonly hostName: string;

  constructor() {
    super();
    this.hostName = this.context.name;
  }
}
