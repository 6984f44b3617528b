import { Injectable, Logger } from "@nestjs/common";
import { access, readFile } from "fs/promises";
import { extname } from "path";
import { parse } from "csv-parse/sync";
import { CellValue, Workbook } from "exceljs";
import { Municipality } from "./municipality.types";
import { PipelineConfigurationError } from "../common/errors/humidity-pipeline.error";
import {
  normalizeMunicipalityCode,
  toNullableNumber,
} from "../common/utils/value.util";

type CellPrimitive = string | number | null;

interface ReferenceTable {
  headers: string[];
  rows: CellPrimitive[][];
}

interface ColumnIndexes {
  code: number;
  name: number | null;
  state: number | null;
  latitude: number;
  longitude: number;
}

const CODE_HEADERS = ["cd_mun", "cd_ibge"];
const NAME_HEADERS = ["nm_mun"];
const STATE_HEADERS = ["sigla_uf", "uf"];

/**
 * Municipality Loader
 *
 * Reads the municipality reference table (IBGE code, name, UF, coordinates)
 * from an .xlsx workbook or a .csv export of it.
 *
 * Rules:
 * - Headers are matched case-insensitively; latitude/longitude are the first
 *   headers containing "lat"/"lon"
 * - Codes keep their first digit run, zero-padded to 7 digits
 * - Rows without a code or without both coordinates are dropped
 * - Duplicate codes keep the first row
 */
@Injectable()
export class MunicipalityLoaderService {
  private readonly logger = new Logger(MunicipalityLoaderService.name);

  async load(path: string): Promise<Municipality[]> {
    try {
      await access(path);
    } catch {
      throw new PipelineConfigurationError(
        `Municipality reference file not found: ${path}`,
      );
    }

    const table =
      extname(path).toLowerCase() === ".csv"
        ? await this.readCsv(path)
        : await this.readWorkbook(path);

    const columns = this.resolveColumns(table.headers, path);
    const municipalities: Municipality[] = [];
    const seen = new Set<string>();
    let dropped = 0;

    for (const row of table.rows) {
      const code = normalizeMunicipalityCode(row[columns.code]);
      const latitude = toNullableNumber(row[columns.latitude]);
      const longitude = toNullableNumber(row[columns.longitude]);

      if (code === null || latitude === null || longitude === null) {
        dropped++;
        continue;
      }
      if (seen.has(code)) {
        dropped++;
        continue;
      }
      seen.add(code);

      municipalities.push({
        code,
        name: this.readText(row, columns.name),
        state: this.readText(row, columns.state),
        latitude,
        longitude,
      });
    }

    this.logger.log(
      `Loaded ${municipalities.length} municipalities from ${path}` +
        (dropped > 0 ? ` (${dropped} rows dropped)` : ""),
    );

    return municipalities;
  }

  private resolveColumns(headers: string[], path: string): ColumnIndexes {
    const lower = headers.map((header) => header.trim().toLowerCase());
    const findExact = (aliases: string[]): number | null => {
      for (const alias of aliases) {
        const index = lower.indexOf(alias);
        if (index >= 0) return index;
      }
      return null;
    };
    const findContaining = (fragment: string): number | null => {
      const index = lower.findIndex((header) => header.includes(fragment));
      return index >= 0 ? index : null;
    };

    const latitude = findContaining("lat");
    const longitude = findContaining("lon");
    if (latitude === null || longitude === null) {
      throw new PipelineConfigurationError(
        `Municipality reference file has no latitude/longitude columns: ${path}`,
      );
    }

    const code = findExact(CODE_HEADERS);
    if (code === null) {
      throw new PipelineConfigurationError(
        `Municipality reference file has no CD_MUN column: ${path}`,
      );
    }

    const name = findExact(NAME_HEADERS);
    const state = findExact(STATE_HEADERS);
    if (name === null || state === null) {
      this.logger.warn(
        `Municipality reference file lacks ${name === null ? "NM_MUN" : "SIGLA_UF"}; using empty values`,
      );
    }

    return { code, name, state, latitude, longitude };
  }

  private readText(row: CellPrimitive[], index: number | null): string {
    if (index === null) return "";
    const value = row[index];
    return value === null || value === undefined ? "" : String(value).trim();
  }

  private async readWorkbook(path: string): Promise<ReferenceTable> {
    const workbook = new Workbook();
    try {
      await workbook.xlsx.readFile(path);
    } catch (error: unknown) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      throw new PipelineConfigurationError(
        `Cannot read municipality workbook ${path}: ${errorMessage}`,
      );
    }

    const sheet = workbook.worksheets[0];
    if (!sheet) {
      return { headers: [], rows: [] };
    }

    const headers: string[] = [];
    const rows: CellPrimitive[][] = [];
    const columnCount = sheet.columnCount;

    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      const values: CellPrimitive[] = [];
      for (let column = 1; column <= columnCount; column++) {
        values.push(toPrimitive(row.getCell(column).value));
      }
      if (rowNumber === 1) {
        headers.push(...values.map((value) => (value === null ? "" : String(value))));
      } else {
        rows.push(values);
      }
    });

    return { headers, rows };
  }

  private async readCsv(path: string): Promise<ReferenceTable> {
    const content = await readFile(path, "utf-8");
    const records: unknown = parse(content, {
      bom: true,
      delimiter: [",", ";"],
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    });

    if (!Array.isArray(records) || records.length === 0) {
      return { headers: [], rows: [] };
    }

    const [headerRow, ...dataRows] = records.map((record: unknown) =>
      Array.isArray(record)
        ? record.map((cell: unknown) => (typeof cell === "string" ? cell : null))
        : [],
    );

    return {
      headers: headerRow.map((cell) => cell ?? ""),
      rows: dataRows,
    };
  }
}

/**
 * Flatten an exceljs cell (formula, rich text, hyperlink, date...) to the
 * string or number it displays.
 */
function toPrimitive(value: CellValue): CellPrimitive {
  if (value === null || value === undefined) return null;
  if (typeof value === "number" || typeof value === "string") return value;
  if (typeof value === "boolean") return String(value);
  if (value instanceof Date) return value.toISOString();
  if ("richText" in value) {
    return value.richText.map((part) => part.text).join("");
  }
  if ("hyperlink" in value) return value.text;
  if ("result" in value) {
    const result = value.result;
    if (result === undefined || result === null) return null;
    if (typeof result === "number" || typeof result === "string") return result;
    if (result instanceof Date) return result.toISOString();
    return null;
  }
  return null;
}
