import fs from "node:fs";
import path from "node:path";
import Ajv2020 from "ajv/dist/2020.js";
import addFormats from "ajv-formats";
import { packageRoot } from "../core/paths.js";

type AjvValidateFn = ((data: unknown) => boolean) & { errors?: unknown };

type AjvInstance = {
  compile: (schema: unknown) => AjvValidateFn;
  errorsText: (errors: unknown) => string;
};

/** The names of the schemas shipped in schemas/*.schema.json. */
export type SchemaName = "config" | "manifest" | "evolution-entry";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

/** A compiled schema that narrows the validated value on success. */
export type SchemaGuard<T> = {
  check: (data: unknown) => data is T;
  /** Human-readable errors from the most recent failed check. */
  errorsText: () => string;
};

function createAjv(): AjvInstance {
  const AjvCtor = Ajv2020 as unknown as { new (opts: unknown): AjvInstance };
  const add = addFormats as unknown as (ajv: AjvInstance) => void;

  const ajv = new AjvCtor({ allErrors: true, strict: true });
  add(ajv);
  return ajv;
}

/**
 * Schema registry: discovers the *.schema.json files in a directory and
 * compiles validators on demand.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private readonly ajv: AjvInstance = createAjv();

  constructor(private readonly schemaDir: string) {}

  load(): void {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json")).sort();
    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
      // "manifest.schema.json" → "manifest"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** name → version map, e.g. { manifest: "1.0.0" }. */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  getValidator(name: string): AjvValidateFn {
    const cached = this.validators.get(name);
    if (cached) return cached;

    const entry = this.entries.get(name);
    if (!entry) {
      throw new Error(`Schema not found: ${name}`);
    }

    const validate = this.ajv.compile(entry.schema);
    this.validators.set(name, validate);
    return validate;
  }

  validate(name: string, data: unknown): { valid: boolean; errors: string | null } {
    const validate = this.getValidator(name);
    const valid = validate(data);
    return { valid, errors: valid ? null : this.ajv.errorsText(validate.errors) };
  }

  /** Type guard for values of type T that the named schema describes. */
  guard<T>(name: SchemaName): SchemaGuard<T> {
    const validate = this.getValidator(name);
    const check = (data: unknown): data is T => validate(data);
    return { check, errorsText: () => this.ajv.errorsText(validate.errors) };
  }
}

/** Version from the schema's $id ("...@1.0.0.json"). */
function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null || !("$id" in schema)) return null;
  const id = schema.$id;
  if (typeof id !== "string") return null;
  const m = /@(\d+\.\d+\.\d+)/.exec(id);
  return m ? m[1] : null;
}

let shared: SchemaRegistry | null = null;

/**
 * Load a registry from the given directory, or the package's schemas/
 * directory (cached) when none is given.
 */
export function createRegistry(schemaDir?: string): SchemaRegistry {
  if (!schemaDir && shared) return shared;
  const registry = new SchemaRegistry(schemaDir ?? path.join(packageRoot(), "schemas"));
  registry.load();
  if (!schemaDir) shared = registry;
  return registry;
}
