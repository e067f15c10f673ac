// packages/core/src/config/AlgorithmRegistry.ts
import type { AlgorithmDescriptor, AlgorithmId, AlgorithmName } from "../types/index.js";
import { ConfigurationError } from "../errors/index.js";

export class AlgorithmRegistry {
  private static readonly byId = new Map<number, AlgorithmDescriptor>();

  static register(a: AlgorithmDescriptor): void {
    if (this.byId.has(a.id)) throw new ConfigurationError(`Algorithm ${a.id} already registered`);
    this.byId.set(a.id, a);
  }
  static has(id: number): boolean {
    return this.byId.has(id);
  }
  static get(id: number): AlgorithmDescriptor {
    const a = this.byId.get(id);
    if (!a) throw new ConfigurationError(`Unknown algorithm: ${id}`);
    return a;
  }
  static byName(name: string): AlgorithmDescriptor {
    for (const a of this.byId.values()) if (a.name === name) return a;
    throw new ConfigurationError(`Unknown algorithm: ${name}`);
  }
  /** Accepts either the header byte or the algorithm name */
  static resolve(ref: AlgorithmId | AlgorithmName | number | string): AlgorithmDescriptor {
    return typeof ref === 'number' ? this.get(ref) : this.byName(ref);
  }
  static list(): AlgorithmDescriptor[] {
    return [...this.byId.values()];
  }
  // default algorithm for new streams
  static get current(): AlgorithmDescriptor { return this.get(0x01); }
}
