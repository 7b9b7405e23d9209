import type { Scalar } from "./row";
import type { EntitySchema, FieldDescriptor } from "./schema";

const uuidPattern = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/** Check `value` against a field's semantic type; `undefined` means it does not fit. */
function castValue(field: FieldDescriptor, value: unknown): Scalar | undefined {
  if (value === null) {
    return field.optional ? null : undefined;
  }
  switch (field.type) {
    case "string":
      return typeof value === "string" ? value : undefined;
    case "uuid":
      return typeof value === "string" && uuidPattern.test(value) ? value : undefined;
    case "int":
      return typeof value === "number" && Number.isInteger(value) ? value : undefined;
    case "float":
      return typeof value === "number" && Number.isFinite(value) ? value : undefined;
    case "bool":
      return typeof value === "boolean" ? value : undefined;
    case "timestamp": {
      const date = value instanceof Date ? value : typeof value === "string" ? new Date(value) : undefined;
      return date && !Number.isNaN(date.getTime()) ? date : undefined;
    }
    case "bytes":
      return value instanceof Uint8Array ? value : undefined;
  }
}

/**
 * Pending write for one table plus its validation errors.
 * Every method returns a new changeset.
 * Next: pass it to `repo.insert(...)` or `repo.update(...)`; invalid ones are rejected before any SQL runs.
 */
export class Changeset {
  public readonly schema: EntitySchema;
  /** Field name -> cast value. */
  public readonly changes: Readonly<Record<string, Scalar>>;
  /** Field name -> message. */
  public readonly errors: Readonly<Record<string, string>>;

  private constructor(
    schema: EntitySchema,
    changes: Record<string, Scalar>,
    errors: Record<string, string>,
  ) {
    this.schema = schema;
    this.changes = Object.freeze(changes);
    this.errors = Object.freeze(errors);
    Object.freeze(this);
  }

  /**
   * Keep the declared fields of `params` (optionally only `permitted` ones) and type-check each.
   * @example
   * Changeset.cast(users, { name: "Ada", age: "36" }).errors // { age: "invalid value type" }
   */
  static cast(
    schema: EntitySchema,
    params: Readonly<Record<string, unknown>>,
    permitted?: readonly string[],
  ): Changeset {
    let changeset = new Changeset(schema, {}, {});
    for (const field of schema.fields) {
      if (permitted && !permitted.includes(field.name)) continue;
      if (!(field.name in params)) continue;
      changeset = changeset.put(field.name, params[field.name]);
    }
    return changeset;
  }

  get targetTable(): string {
    return this.schema.table;
  }

  get isValid(): boolean {
    return Object.keys(this.errors).length === 0;
  }

  /** Set one field, type-checked like `cast`. */
  put(name: string, value: unknown): Changeset {
    const field = this.schema.field(name);
    if (!field || field.name !== name) {
      return this.addError(name, "is not a field");
    }
    const cast = castValue(field, value);
    if (cast === undefined) {
      return this.addError(name, "invalid value type");
    }
    return new Changeset(this.schema, { ...this.changes, [name]: cast }, { ...this.errors });
  }

  /** Add `"is required"` for every listed field that has no change. */
  validateRequired(...fields: string[]): Changeset {
    let changeset: Changeset = this;
    for (const name of fields) {
      const value = changeset.changes[name];
      if (value === undefined || value === null) {
        changeset = changeset.addError(name, "is required");
      }
    }
    return changeset;
  }

  /** Messages for the same field are joined with `; `. */
  addError(name: string, message: string): Changeset {
    const existing = this.errors[name];
    return new Changeset(this.schema, { ...this.changes }, {
      ...this.errors,
      [name]: existing === undefined ? message : `${existing}; ${message}`,
    });
  }
}
