import Papa from "papaparse";
import * as XLSX from "xlsx";
import type {
  CellValue,
  ColumnSchema,
  ColumnSummary,
  ColumnType,
  DataRow,
  Dataset,
  DatasetPreview,
  DatasetSummary,
} from "@/lib/types";
import type { DatasetLimits } from "@/lib/config";

export type DatasetErrorCode = "unsupported_format" | "empty" | "malformed" | "too_large";

export class DatasetLoadError extends Error {
  constructor(
    readonly code: DatasetErrorCode,
    message: string
  ) {
    super(message);
    this.name = "DatasetLoadError";
  }
}

export interface DatasetInput {
  fileName: string;
  data: Uint8Array;
}

const DEFAULT_LIMITS: DatasetLimits = {
  maxBytes: 10 * 1024 * 1024,
  maxRows: 100_000,
};

// Miles con coma ("1,234.5"), decimales sueltos (".5") y exponentes
const NUMERIC = /^[-+]?(?:\d{1,3}(?:,\d{3})+|\d+|(?=\.\d))(?:\.\d+)?(?:[eE][-+]?\d+)?$/;
const DATE_ONLY = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})$/;
const DATE_TIME = /^\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?$/;
const TRUE_TOKENS = new Set(["true", "yes", "si", "sí"]);
const FALSE_TOKENS = new Set(["false", "no"]);
const MISSING_TOKENS = new Set(["", "na", "n/a", "nan", "null", "none"]);

export function detectFormat(fileName: string): Dataset["format"] {
  const ext = fileName.toLowerCase().split(".").pop() ?? "";
  if (ext === "csv" || ext === "tsv" || ext === "txt") return "csv";
  if (ext === "xlsx" || ext === "xls") return "xlsx";
  throw new DatasetLoadError(
    "unsupported_format",
    `Formato no soportado: "${fileName}". Subí un archivo CSV o Excel (.xlsx, .xls).`
  );
}

function isMissing(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "number") return Number.isNaN(value);
  if (typeof value === "string") return MISSING_TOKENS.has(value.trim().toLowerCase());
  return false;
}

function cellToText(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function parseNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;
  const s = value.trim();
  if (!NUMERIC.test(s)) return null;
  const n = Number(s.replace(/,/g, ""));
  return Number.isFinite(n) ? n : null;
}

function parseBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") return value;
  if (typeof value !== "string") return null;
  const s = value.trim().toLowerCase();
  if (TRUE_TOKENS.has(s)) return true;
  if (FALSE_TOKENS.has(s)) return false;
  return null;
}

function parseDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== "string") return null;
  const s = value.trim();
  const dateOnly = DATE_ONLY.exec(s);
  if (dateOnly) {
    const [, y, m, d] = dateOnly;
    const iso = `${y}-${m.padStart(2, "0")}-${d.padStart(2, "0")}`;
    return Number.isNaN(Date.parse(iso)) ? null : iso;
  }
  if (DATE_TIME.test(s) && !Number.isNaN(Date.parse(s))) return s;
  return null;
}

export function inferColumnType(values: unknown[]): ColumnType {
  const present = values.filter((v) => !isMissing(v));
  if (present.length === 0) return "string";
  if (present.every((v) => parseNumber(v) !== null)) return "number";
  if (present.every((v) => parseBoolean(v) !== null)) return "boolean";
  if (present.every((v) => parseDate(v) !== null)) return "date";
  return "string";
}

function coerce(value: unknown, type: ColumnType): CellValue {
  if (isMissing(value)) return null;
  switch (type) {
    case "number":
      return parseNumber(value);
    case "boolean":
      return parseBoolean(value);
    case "date":
      return parseDate(value);
    default:
      return cellToText(value);
  }
}

function normalizeHeaders(raw: unknown[]): string[] {
  const used = new Set<string>();
  return raw.map((cell, i) => {
    const base = cellToText(cell) || `column_${i + 1}`;
    let name = base;
    let n = 1;
    while (used.has(name)) {
      n++;
      name = `${base}_${n}`;
    }
    used.add(name);
    return name;
  });
}

function decodeText(data: Uint8Array): string {
  // TextDecoder descarta el BOM
  return new TextDecoder("utf-8").decode(data);
}

function parseCsvMatrix(data: Uint8Array): unknown[][] {
  const result = Papa.parse<string[]>(decodeText(data), {
    header: false,
    skipEmptyLines: "greedy",
  });

  // Un archivo de una sola columna no tiene delimitador detectable: no es un error
  const errors = result.errors.filter((e) => e.code !== "UndetectableDelimiter");
  if (errors.length > 0) {
    const first = errors[0];
    const where = first.row !== undefined ? ` (fila ${first.row + 1})` : "";
    throw new DatasetLoadError("malformed", `CSV invalido${where}: ${first.message}`);
  }
  return result.data;
}

function parseWorkbookMatrix(data: Uint8Array): unknown[][] {
  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: "array", cellDates: true });
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : "Error desconocido";
    throw new DatasetLoadError("malformed", `No se pudo leer el libro Excel: ${message}`);
  }

  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    throw new DatasetLoadError("empty", "El libro Excel no tiene hojas.");
  }
  return XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    raw: true,
    blankrows: false,
  });
}

/** Rechaza archivos vacios o mas grandes que `limits.maxBytes`, antes de leerlos. */
export function checkSize(byteLength: number, limits: DatasetLimits = DEFAULT_LIMITS): void {
  if (byteLength === 0) {
    throw new DatasetLoadError("empty", "El archivo esta vacio.");
  }
  if (byteLength > limits.maxBytes) {
    throw new DatasetLoadError(
      "too_large",
      `El archivo supera el limite de ${Math.round(limits.maxBytes / 1024 / 1024)} MB.`
    );
  }
}

/**
 * Carga un CSV o Excel en memoria con tipos inferidos por columna.
 * Todo o nada: cualquier problema lanza DatasetLoadError.
 */
export function loadDataset(input: DatasetInput, limits: DatasetLimits = DEFAULT_LIMITS): Dataset {
  const format = detectFormat(input.fileName);
  checkSize(input.data.byteLength, limits);

  const matrix = format === "csv" ? parseCsvMatrix(input.data) : parseWorkbookMatrix(input.data);
  const [headerRow, ...records] = matrix;
  if (!headerRow || headerRow.length === 0) {
    throw new DatasetLoadError("empty", "El archivo no tiene encabezado.");
  }
  if (records.length === 0) {
    throw new DatasetLoadError("empty", "El archivo no tiene filas de datos.");
  }
  if (records.length > limits.maxRows) {
    throw new DatasetLoadError(
      "too_large",
      `El archivo tiene ${records.length} filas; el limite es ${limits.maxRows}.`
    );
  }

  const names = normalizeHeaders(headerRow);
  const ragged = records.findIndex((r) => r.length !== names.length);
  if (ragged !== -1) {
    throw new DatasetLoadError(
      "malformed",
      `La fila ${ragged + 2} tiene ${records[ragged].length} campos; el encabezado tiene ${names.length}.`
    );
  }

  const types = names.map((_, col) => inferColumnType(records.map((r) => r[col])));
  const rows: DataRow[] = records.map((record) => {
    const row: DataRow = {};
    names.forEach((name, col) => {
      row[name] = coerce(record[col], types[col]);
    });
    return row;
  });

  const columns: ColumnSchema[] = names.map((name, col) => {
    const present = rows.map((r) => r[name]).filter((v) => v !== null);
    return {
      name,
      type: types[col],
      nonNull: present.length,
      unique: new Set(present).size,
    };
  });

  return {
    id: crypto.randomUUID(),
    fileName: input.fileName,
    format,
    columns,
    rows,
    loadedAt: Date.now(),
  };
}

function topValues(values: CellValue[], limit: number): string[] {
  const counts = new Map<string, number>();
  for (const v of values) {
    const key = String(v);
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  // sort es estable: los empates quedan en orden de aparicion
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([key]) => key);
}

function round(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/**
 * Resumen liviano del dataset para el prompt.
 */
export function summarizeDataset(dataset: Dataset, sampleRows = 5): DatasetSummary {
  const columns: ColumnSummary[] = dataset.columns.map((column) => {
    const present = dataset.rows.map((r) => r[column.name]).filter((v) => v !== null);
    const summary: ColumnSummary = {
      ...column,
      nulls: dataset.rows.length - present.length,
    };

    if (column.type === "number") {
      const nums = present.filter((v): v is number => typeof v === "number");
      if (nums.length > 0) {
        summary.min = Math.min(...nums);
        summary.max = Math.max(...nums);
        summary.mean = round(nums.reduce((a, b) => a + b, 0) / nums.length);
      }
    } else if (column.type === "date") {
      const sorted = present.map(String).sort();
      if (sorted.length > 0) summary.range = [sorted[0], sorted[sorted.length - 1]];
    } else {
      summary.topValues = topValues(present, 5);
    }
    return summary;
  });

  return {
    fileName: dataset.fileName,
    rowCount: dataset.rows.length,
    columnCount: dataset.columns.length,
    columns,
    sampleRows: dataset.rows.slice(0, sampleRows),
  };
}

export function previewDataset(dataset: Dataset, limit = 50): DatasetPreview {
  return {
    fileName: dataset.fileName,
    format: dataset.format,
    rowCount: dataset.rows.length,
    columns: dataset.columns,
    preview: dataset.rows.slice(0, limit),
  };
}
