/**
 * Schema Validator - JSON-schema-style checks for untrusted payloads
 * (provider machine records, the config file, stored registries).
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type SchemaType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type: SchemaType | SchemaType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: ReadonlyArray<string | number | boolean>;
    pattern?: string;
    minimum?: number;
    maximum?: number;
    minItems?: number;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
        const actualType = this.getType(value);
        const typeOk = allowed.some(t => t === actualType || (t === 'number' && actualType === 'integer'));
        if (!typeOk) {
            errors.push({
                path,
                message: `Expected type ${allowed.join('|')}, got ${actualType}`,
            });
            return;
        }

        if (isRecord(value) && schema.properties) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            for (const [key, propSchema] of Object.entries(schema.properties)) {
                if (key in value) {
                    this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                }
            }
        }

        if (Array.isArray(value)) {
            if (schema.minItems !== undefined && value.length < schema.minItems) {
                errors.push({ path, message: `Expected at least ${schema.minItems} items, got ${value.length}` });
            }
            if (schema.items) {
                for (let i = 0; i < value.length; i++) {
                    this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
                }
            }
        }

        if (schema.enum && (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean')) {
            if (!schema.enum.includes(value)) {
                errors.push({
                    path,
                    message: `Value must be one of: ${schema.enum.join(', ')}`,
                });
            }
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): SchemaType | 'undefined' | 'other' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        if (typeof value === 'number') {
            if (!Number.isFinite(value)) return 'other';
            return Number.isInteger(value) ? 'integer' : 'number';
        }
        if (typeof value === 'string') return 'string';
        if (typeof value === 'boolean') return 'boolean';
        if (typeof value === 'object') return 'object';
        if (typeof value === 'undefined') return 'undefined';
        return 'other';
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Render validation errors as "path: message" lines. */
export function describeErrors(result: ValidationResult): string[] {
    return result.errors.map(e => `${e.path || '<root>'}: ${e.message}`);
}
