import { BackendNotFoundError } from '../utils/errorHandler';
import { Backend } from './base-backend';

/**
 * Name to backend mapping. Registration order is kept; registering a name
 * again replaces the earlier backend in place.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, Backend>();

  register(backend: Backend): this {
    this.backends.set(backend.name, backend);
    return this;
  }

  has(name: string): boolean {
    return this.backends.has(name);
  }

  get(name: string): Backend {
    const backend = this.backends.get(name);
    if (!backend) {
      throw new BackendNotFoundError(name, this.list());
    }
    return backend;
  }

  list(): string[] {
    return Array.from(this.backends.keys());
  }
}
