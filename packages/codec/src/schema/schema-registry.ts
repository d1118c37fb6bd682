import type { Schema, SchemaSource } from '@trackside/domain';
import { loadSchema } from './schema-loader.js';

export type SchemaListener = (schema: Schema, previous: Schema) => void;
/** Throws (normally a SchemaError) to veto a schema before it becomes active. */
export type SchemaCheck = (schema: Schema, active: Schema) => void;

/**
 * Holds the active schema. Readers take `current` once per operation and keep
 * that reference; writers replace it wholesale, so no reader ever sees a
 * half-built catalog.
 */
export class SchemaRegistry {
  private active: Schema;
  private readonly listeners = new Set<SchemaListener>();
  private readonly checks = new Set<SchemaCheck>();

  constructor(initial: Schema) {
    this.active = initial;
  }

  static async fromSource(source: SchemaSource): Promise<SchemaRegistry> {
    return new SchemaRegistry(loadSchema(await source.read()));
  }

  get current(): Schema {
    return this.active;
  }

  commit(schema: Schema): void {
    const previous = this.active;
    for (const check of this.checks) check(schema, previous);
    this.active = schema;
    for (const listener of this.listeners) listener(schema, previous);
  }

  /**
   * Load a fresh schema from `source` and swap it in. When loading fails or a
   * check vetoes it, the error propagates and the active schema is left untouched.
   */
  async reload(source: SchemaSource): Promise<Schema> {
    const schema = loadSchema(await source.read());
    this.commit(schema);
    return schema;
  }

  addCheck(check: SchemaCheck): () => void {
    this.checks.add(check);
    return () => this.checks.delete(check);
  }

  onCommit(listener: SchemaListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
