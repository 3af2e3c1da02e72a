import type { Service } from '../types.js';
import { HttpService } from './http-service.js';
import type { HttpServiceConfig } from './http-service.js';

/** Opened services, looked up by name or by service URL. */
export class ServiceRegistry {
  private readonly services: Map<string, Service> = new Map();

  /** Creates an HttpService and registers it under its name and URL. */
  open(config: HttpServiceConfig): HttpService {
    const service = new HttpService(config);
    this.register(service);
    return service;
  }

  register(service: Service): void {
    this.services.set(service.name, service);
    this.services.set(service.serviceUrl, service);
  }

  get(key: string): Service | undefined {
    return this.services.get(key);
  }

  has(key: string): boolean {
    return this.services.has(key);
  }

  flush(): void {
    this.services.clear();
  }
}
