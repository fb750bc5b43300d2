type ServiceToken = symbol;
type Factory<T> = (container: Container) => T;

/**
 * Token-based DI container. Providers are created on first resolve and cached.
 */
export class Container {
    private readonly factories = new Map<ServiceToken, Factory<unknown>>();
    private readonly instances = new Map<ServiceToken, unknown>();

    register<T>(token: ServiceToken, factory: Factory<T>): this {
        this.factories.set(token, factory);
        this.instances.delete(token);
        return this;
    }

    /** Bind an already built instance, e.g. a test double. */
    registerInstance<T>(token: ServiceToken, instance: T): this {
        this.factories.set(token, () => instance);
        this.instances.set(token, instance);
        return this;
    }

    has(token: ServiceToken): boolean {
        return this.factories.has(token);
    }

    resolve<T>(token: ServiceToken): T {
        if (this.instances.has(token)) {
            return this.instances.get(token) as T;
        }
        const factory = this.factories.get(token);
        if (!factory) {
            throw new Error(`No provider registered for token: ${String(token)}`);
        }
        const created = factory(this) as T;
        this.instances.set(token, created);
        return created;
    }
}
