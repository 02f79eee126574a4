import { z } from 'zod';
import { RECORD_MODELS } from './schemas.js';

export interface SchemaField {
  name: string;
  type: string;
}

export interface SchemaModel {
  name: string;
  fields: SchemaField[];
}

function typeName(schema: z.ZodTypeAny): string {
  if (schema instanceof z.ZodNullable) return `${typeName(schema.unwrap())} | null`;
  if (schema instanceof z.ZodOptional) return `${typeName(schema.unwrap())} | undefined`;
  if (schema instanceof z.ZodArray) {
    const element = typeName(schema.element);
    return element.includes(' ') ? `(${element})[]` : `${element}[]`;
  }
  if (schema instanceof z.ZodEnum) return schema.options.map((o: string) => `'${o}'`).join(' | ');
  if (schema instanceof z.ZodString) return 'string';
  if (schema instanceof z.ZodNumber) return 'number';
  if (schema instanceof z.ZodBoolean) return 'boolean';
  if (schema instanceof z.ZodObject) return 'object';
  return 'unknown';
}

// Field listing for admin tooling. Stored metadata (id, created_at, updated_at) is not repeated per model.
export function describeRecords(): SchemaModel[] {
  const models: Record<string, z.AnyZodObject> = RECORD_MODELS;
  return Object.entries(models).map(([name, schema]) => {
    const shape: z.ZodRawShape = schema.shape;
    return {
      name,
      fields: Object.entries(shape).map(([field, type]) => ({ name: field, type: typeName(type) })),
    };
  });
}
