/**
 * Line-oriented reader for schema text.
 *
 * ```
 * enum Level { debug, info, warn }
 *
 * Server {
 *   host: string;
 *   port: integer;
 *   tags: array<string>;
 *   level: Level
 * }
 * ```
 *
 * Blank lines and lines starting with `//` or `#` are skipped. Every declared
 * field is required and unconstrained; defaults and constraints need the
 * programmatic API.
 *
 * @packageDocumentation
 */

import { IoError, SchemaParseError } from '../errors/index.js';
import { PathValidationError, safeReadFileSync } from '../utils/safe-fs.js';
import { Schema } from './schema.js';
import type { SchemaOptions } from './schema.js';
import { field, t } from './types.js';
import type { FieldDefinition, PrimitiveKind, TypeDefinition } from './types.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const ENUM_HEADER = /^enum\s+([A-Za-z_][A-Za-z0-9_]*)\s*\{(.*)$/;
const PRIMITIVES: ReadonlySet<string> = new Set([
  'null',
  'boolean',
  'integer',
  'double',
  'string',
]);

function isSkippable(line: string): boolean {
  return line === '' || line.startsWith('//') || line.startsWith('#');
}

function isPrimitiveKind(text: string): text is PrimitiveKind {
  return PRIMITIVES.has(text);
}

function splitValues(text: string): string[] {
  return text
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry !== '');
}

/**
 * Parses the type text of a field, e.g. `array<optional<string>>`.
 *
 * @param text - Type text without the trailing `;`.
 * @param line - 1-based line for error reporting.
 * @returns The type definition; unknown identifiers become object references.
 * @throws SchemaParseError if the text is not a type.
 */
export function parseTypeText(text: string, line: number): TypeDefinition {
  const trimmed = text.trim();

  if (isPrimitiveKind(trimmed)) {
    return { kind: trimmed };
  }
  if (trimmed.startsWith('array<') && trimmed.endsWith('>')) {
    return t.array(parseTypeText(trimmed.slice('array<'.length, -1), line));
  }
  if (trimmed.startsWith('optional<') && trimmed.endsWith('>')) {
    return t.optional(parseTypeText(trimmed.slice('optional<'.length, -1), line));
  }
  if (IDENTIFIER.test(trimmed)) {
    return t.object(trimmed);
  }
  throw new SchemaParseError(`Invalid type '${trimmed}'`, line);
}

/**
 * Cursor over the trimmed lines of a schema text.
 */
class SchemaReader {
  private index = 0;
  private readonly lines: readonly string[];

  constructor(
    text: string,
    private readonly schema: Schema
  ) {
    this.lines = text.split(/\r?\n/).map((line) => line.trim());
  }

  read(): Schema {
    for (let line = this.next(); line !== undefined; line = this.next()) {
      if (isSkippable(line)) {
        continue;
      }
      if (line.startsWith('enum ') || line.startsWith('enum{')) {
        this.readEnum(line);
      } else if (line.includes('{')) {
        this.readObject(line);
      } else {
        throw new SchemaParseError(`Unexpected line '${line}'`, this.index);
      }
    }
    return this.schema;
  }

  private readEnum(header: string): void {
    const startLine = this.index;
    const match = ENUM_HEADER.exec(header);
    const name = match?.[1];
    const rest = match?.[2];
    if (name === undefined || rest === undefined) {
      throw new SchemaParseError('Invalid enum definition', startLine);
    }

    const values: string[] = [];
    let body: string | undefined = rest;
    while (body !== undefined) {
      const close = body.indexOf('}');
      if (close >= 0) {
        values.push(...splitValues(body.slice(0, close)));
        this.schema.addEnum(name, values);
        return;
      }
      if (!isSkippable(body)) {
        values.push(...splitValues(body));
      }
      body = this.next();
    }

    throw new SchemaParseError(`Unterminated enum '${name}'`, startLine);
  }

  private readObject(header: string): void {
    const startLine = this.index;
    const open = header.indexOf('{');
    const name = header.slice(0, open).trim();
    if (!IDENTIFIER.test(name)) {
      throw new SchemaParseError(`Invalid object schema name '${name}'`, startLine);
    }

    const fields: Record<string, FieldDefinition> = {};
    let body: string | undefined = header.slice(open + 1).trim();
    while (body !== undefined) {
      const close = body.indexOf('}');
      const content = (close >= 0 ? body.slice(0, close) : body).trim();
      if (!isSkippable(content)) {
        const [fieldName, definition] = this.readField(content);
        fields[fieldName] = definition;
      }
      if (close >= 0) {
        this.schema.addObjectSchema(name, fields);
        return;
      }
      body = this.next();
    }

    throw new SchemaParseError(`Unterminated object schema '${name}'`, startLine);
  }

  private readField(content: string): [string, FieldDefinition] {
    const colon = content.indexOf(':');
    if (colon < 0) {
      throw new SchemaParseError(`Expected 'name: type' in field definition '${content}'`, this.index);
    }

    const fieldName = content.slice(0, colon).trim();
    if (!IDENTIFIER.test(fieldName)) {
      throw new SchemaParseError(`Invalid field name '${fieldName}'`, this.index);
    }

    let typeText = content.slice(colon + 1).trim();
    if (typeText.endsWith(';')) {
      typeText = typeText.slice(0, -1);
    }
    return [fieldName, field(parseTypeText(typeText, this.index))];
  }

  /** Returns the next line and advances; `index` is then its 1-based number. */
  private next(): string | undefined {
    const line = this.lines[this.index];
    if (line !== undefined) {
      this.index += 1;
    }
    return line;
  }
}

/**
 * Parses schema text into a {@link Schema}.
 *
 * The result has no root type; call `setRootType` to validate whole trees.
 *
 * @param text - Schema source.
 * @param options - Options for the created schema.
 * @returns The schema.
 * @throws SchemaParseError on malformed declarations.
 */
export function parseSchema(text: string, options: SchemaOptions = {}): Schema {
  return new SchemaReader(text, new Schema(options)).read();
}

/**
 * Reads and parses a schema file.
 *
 * @param filePath - Path of the schema file.
 * @param options - Options for the created schema.
 * @throws IoError if the file cannot be read.
 * @throws SchemaParseError on malformed declarations.
 */
export function parseSchemaFile(filePath: string, options: SchemaOptions = {}): Schema {
  let text: string;
  try {
    text = safeReadFileSync(filePath);
  } catch (error) {
    if (error instanceof PathValidationError) {
      throw new IoError(`${error.message}: '${filePath}'`, error);
    }
    if (error instanceof Error) {
      throw new IoError(`Failed to read schema file '${filePath}': ${error.message}`, error);
    }
    throw error;
  }
  return parseSchema(text, options);
}
