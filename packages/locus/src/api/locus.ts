import { ConfigurationError } from '../errors/errors.js';
import { Registry } from '../core/registry.js';
import type { RegistryConfig } from '../types/types.js';

/**
 * The designated process-wide access point.
 *
 * Nothing else in the package reaches a global: components take a
 * {@link Registry} explicitly, and applications that want a shared one get it
 * here. The registry is created on first access.
 *
 * @remarks
 * - Call `Locus.configure()` before anything touches `Locus.registry()`
 * - Use `Locus.resetForTests()` between test cases
 *
 * @example
 * ```typescript
 * Locus.configure({ name: 'app', logger });
 * Locus.registry().register(Settings, { useValue: settings });
 * ```
 */
export class Locus {
  private static instance?: Registry;
  private static pendingConfig?: RegistryConfig;

  /** The shared registry, created on first call. */
  static registry(): Registry {
    if (!this.instance) {
      this.instance = new Registry(this.pendingConfig ?? { name: 'global' });
    }
    return this.instance;
  }

  /**
   * Configure the shared registry.
   *
   * @throws {ConfigurationError} once the registry has been created
   */
  static configure(config: RegistryConfig): void {
    if (this.instance) {
      throw new ConfigurationError(
        'The shared registry is already in use; call Locus.configure() before Locus.registry().'
      );
    }
    this.pendingConfig = config;
  }

  /** Whether the shared registry has been created. */
  static get isInitialized(): boolean {
    return this.instance !== undefined;
  }

  /**
   * Dispose and drop the shared registry along with any pending configuration.
   *
   * ⚠️ Use with caution: objects obtained earlier stay usable only if they
   * were not disposed. Primarily useful for testing environments.
   *
   * @throws {AggregateDisposalError} if disposing entries failed; the registry is dropped anyway
   */
  static resetForTests(): void {
    const current = this.instance;
    this.instance = undefined;
    this.pendingConfig = undefined;
    current?.reset();
  }
}
