import { readFile } from "node:fs/promises";
import path from "node:path";

import {
  createConverter,
  isConverterName,
  type Converter
} from "./converters";

export const DEFAULT_SOURCES_PATH = path.resolve(__dirname, "../../sources.json");

const FIELD_TYPES = [
  "String",
  "UInt8",
  "UInt16",
  "UInt32",
  "UInt64",
  "Int32",
  "Int64",
  "Date",
  "DateTime"
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export interface LoadingDefinition {
  sourceName: string;
  fields: string[];
  dateDimension: string;
}

export interface FieldConverter {
  target: string;
  convert: Converter;
}

export interface ProcessingDefinition {
  fieldTypes: Record<string, FieldType>;
  converters: FieldConverter[];
}

export interface SourceDefinition {
  name: string;
  dateRequired: boolean;
  loading: LoadingDefinition;
  processing: ProcessingDefinition;
}

export interface SourcesCollection {
  dateRequiredSources: () => string[];
  dateIgnoredSources: () => string[];
  loadingDefinition: (source: string) => LoadingDefinition;
  processingDefinition: (source: string) => ProcessingDefinition;
}

export class UnknownSourceError extends Error {
  constructor(source: string) {
    super(`Unknown source: ${source}`);
    this.name = "UnknownSourceError";
  }
}

interface RecordLike {
  [key: string]: unknown;
}

function isRecordLike(value: unknown): value is RecordLike {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFieldType(value: unknown): value is FieldType {
  return FIELD_TYPES.some((fieldType) => fieldType === value);
}

export function isIntegerFieldType(fieldType: FieldType): boolean {
  return fieldType.includes("Int");
}

/** 64-bit columns exceed the safe `number` range and are kept as decimal strings. */
export function isWideIntegerFieldType(fieldType: FieldType): boolean {
  return fieldType === "UInt64" || fieldType === "Int64";
}

function parseFieldTypes(raw: unknown, source: string): Record<string, FieldType> {
  if (!isRecordLike(raw)) {
    throw new Error(`Invalid sources catalog: fields of ${source} must be an object`);
  }

  const fieldTypes: Record<string, FieldType> = {};
  for (const [field, fieldType] of Object.entries(raw)) {
    if (!isFieldType(fieldType)) {
      throw new Error(
        `Invalid sources catalog: ${source}.${field} has unknown type ${String(fieldType)}`
      );
    }
    fieldTypes[field] = fieldType;
  }

  return fieldTypes;
}

function parseConverters(raw: unknown, source: string): FieldConverter[] {
  if (raw === undefined) {
    return [];
  }

  if (!Array.isArray(raw)) {
    throw new Error(`Invalid sources catalog: derived of ${source} must be an array`);
  }

  return raw.map((entry: unknown) => {
    if (
      !isRecordLike(entry) ||
      typeof entry.target !== "string" ||
      typeof entry.from !== "string" ||
      !isConverterName(entry.converter)
    ) {
      throw new Error(`Invalid sources catalog: bad derived field in ${source}`);
    }

    return {
      target: entry.target,
      convert: createConverter(entry.converter, entry.from)
    };
  });
}

function parseSource(raw: unknown): SourceDefinition {
  if (!isRecordLike(raw) || typeof raw.name !== "string") {
    throw new Error("Invalid sources catalog: every source needs a name");
  }

  const name = raw.name;
  const fieldTypes = parseFieldTypes(raw.fields, name);

  return {
    name,
    dateRequired: raw.dateRequired !== false,
    loading: {
      sourceName: name,
      fields: Object.keys(fieldTypes),
      dateDimension:
        typeof raw.dateDimension === "string" ? raw.dateDimension : "default"
    },
    processing: {
      fieldTypes,
      converters: parseConverters(raw.derived, name)
    }
  };
}

export function parseSourcesCatalog(payload: unknown): SourceDefinition[] {
  if (!isRecordLike(payload) || !Array.isArray(payload.sources)) {
    throw new Error("Invalid sources catalog: expected { sources: [...] }");
  }

  return payload.sources.map((source: unknown) => parseSource(source));
}

export async function loadSourcesCatalog(
  filePath: string = DEFAULT_SOURCES_PATH
): Promise<SourceDefinition[]> {
  const raw = await readFile(filePath, "utf8");
  return parseSourcesCatalog(JSON.parse(raw));
}

/** `selected` narrows the catalog; an empty list keeps every source. */
export function createSourcesCollection(
  catalog: SourceDefinition[],
  selected: string[] = []
): SourcesCollection {
  const byName = new Map(catalog.map((source) => [source.name, source]));

  for (const name of selected) {
    if (!byName.has(name)) {
      throw new UnknownSourceError(name);
    }
  }

  const active =
    selected.length === 0
      ? catalog
      : catalog.filter((source) => selected.includes(source.name));

  const resolve = (source: string): SourceDefinition => {
    const definition = byName.get(source);
    if (!definition || !active.includes(definition)) {
      throw new UnknownSourceError(source);
    }
    return definition;
  };

  return {
    dateRequiredSources: () =>
      active.filter((source) => source.dateRequired).map((source) => source.name),
    dateIgnoredSources: () =>
      active.filter((source) => !source.dateRequired).map((source) => source.name),
    loadingDefinition: (source) => resolve(source).loading,
    processingDefinition: (source) => resolve(source).processing
  };
}
