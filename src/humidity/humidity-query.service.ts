import { Injectable, NotFoundException } from "@nestjs/common";
import { HumidityDatasetService } from "./humidity-dataset.service";
import { HumidityDataset, HumidityRecord } from "./humidity.types";
import {
  SEVERITY_CLASSES,
  SeverityClass,
  UNKNOWN_COLOR,
  classifyHumidity,
  findSeverityClass,
} from "./humidity-classifier";
import {
  ClassListingDto,
  HumidityMapDto,
  HumidityPointDto,
  HumiditySeriesDto,
  HumiditySummaryDto,
  MunicipalityOptionDto,
} from "./dto/humidity-response.dto";
import { LegendDto, SeverityDto } from "./dto/severity.dto";
import { formatDayLabel } from "../common/utils/date.util";
import { normalizeMunicipalityCode } from "../common/utils/value.util";

export interface HumidityFilter {
  date?: string;
  states?: string[];
  municipality?: string;
}

const DEFAULT_MUNICIPALITY_NAME = "brasília";
const SERIES_LENGTH = 5;

/**
 * Parse a "DF,GO" style query value into UF codes.
 */
export function parseStates(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((state) => state.trim().toUpperCase())
    .filter((state) => state.length > 0);
}

function toSeverityDto(severity: SeverityClass | undefined): SeverityDto | null {
  return severity ? { ...severity } : null;
}

function toPoint(record: HumidityRecord): HumidityPointDto {
  return {
    ...record,
    severity: toSeverityDto(classifyHumidity(record.humidityMin)),
  };
}

function byStateThenName(
  a: { state: string; name: string },
  b: { state: string; name: string },
): number {
  return (
    a.state.localeCompare(b.state, "pt-BR") ||
    a.name.localeCompare(b.name, "pt-BR")
  );
}

/**
 * Humidity Query Service
 *
 * Read-side of the dashboard: map layer, municipality series, list by
 * severity class and filter options. Every query reads the cached daily
 * dataset and classifies on the fly; nothing here mutates the dataset.
 */
@Injectable()
export class HumidityQueryService {
  constructor(private readonly datasetService: HumidityDatasetService) {}

  getLegend(): LegendDto {
    return {
      classes: SEVERITY_CLASSES.map((severity) => ({ ...severity })),
      unknownColor: UNKNOWN_COLOR,
    };
  }

  async getSummary(): Promise<HumiditySummaryDto> {
    const dataset = await this.datasetService.getData();
    const firstDate = dataset.dates[0] ?? null;

    const classCounts: Record<string, number> = {};
    for (const severity of SEVERITY_CLASSES) {
      classCounts[severity.id] = 0;
    }
    classCounts.unknown = 0;

    for (const record of dataset.records) {
      if (record.date !== firstDate) continue;
      const severity = classifyHumidity(record.humidityMin);
      const bucket = severity ? severity.id : "unknown";
      classCounts[bucket] += 1;
    }

    return {
      key: dataset.key,
      generatedAt: dataset.generatedAt,
      source: dataset.source,
      dates: [...dataset.dates],
      states: this.listStates(dataset),
      defaultMunicipality: this.pickDefaultMunicipality(dataset),
      classCounts,
    };
  }

  async getDates(): Promise<string[]> {
    const dataset = await this.datasetService.getData();
    return [...dataset.dates];
  }

  async getStates(): Promise<string[]> {
    return this.listStates(await this.datasetService.getData());
  }

  async getMunicipalityOptions(
    states: string[] = [],
  ): Promise<MunicipalityOptionDto[]> {
    const dataset = await this.datasetService.getData();
    const seen = new Map<string, MunicipalityOptionDto>();

    for (const record of dataset.records) {
      if (states.length > 0 && !states.includes(record.state)) continue;
      if (seen.has(record.code)) continue;
      seen.set(record.code, {
        code: record.code,
        label: `${record.name} / ${record.state}`,
        name: record.name,
        state: record.state,
      });
    }

    return Array.from(seen.values()).sort(byStateThenName);
  }

  /**
   * Records of one date for the map, classified. Without a date the last
   * forecast day is shown.
   */
  async getMap(filter: HumidityFilter = {}): Promise<HumidityMapDto> {
    const dataset = await this.datasetService.getData();
    const date = filter.date ?? lastDate(dataset);

    return {
      date,
      dates: [...dataset.dates],
      items: this.filterRecords(dataset, { ...filter, date: date ?? undefined }).map(
        toPoint,
      ),
    };
  }

  /**
   * The forecast days of one municipality, oldest first.
   */
  async getSeries(code: string): Promise<HumiditySeriesDto> {
    const dataset = await this.datasetService.getData();
    const normalized = normalizeMunicipalityCode(code);

    const records = dataset.records
      .filter((record) => record.code === normalized)
      .slice(-SERIES_LENGTH);

    if (records.length === 0) {
      throw new NotFoundException(`Municipality ${code} not found`);
    }

    const [first] = records;
    return {
      code: first.code,
      name: first.name,
      state: first.state,
      items: records.map((record) => ({
        ...toPoint(record),
        dayLabel: formatDayLabel(record.date),
      })),
    };
  }

  /**
   * Municipalities whose minimum humidity falls in a severity class.
   * Unknown values are left out and each municipality is listed once.
   * Defaults to the last forecast day, like the map.
   */
  async getClassListing(
    classId: string,
    filter: HumidityFilter = {},
  ): Promise<ClassListingDto> {
    const severity = findSeverityClass(classId);
    if (!severity) {
      throw new NotFoundException(`Unknown severity class: ${classId}`);
    }

    const dataset = await this.datasetService.getData();
    const date = filter.date ?? lastDate(dataset);
    const seen = new Set<string>();
    const items: ClassListingDto["items"] = [];

    for (const record of this.filterRecords(dataset, {
      ...filter,
      date: date ?? undefined,
    })) {
      if (record.humidityMin === null || seen.has(record.code)) continue;
      if (classifyHumidity(record.humidityMin)?.id !== severity.id) continue;
      seen.add(record.code);
      items.push({
        code: record.code,
        name: record.name,
        state: record.state,
        humidityMin: record.humidityMin,
      });
    }

    items.sort(byStateThenName);

    return {
      severity: { ...severity },
      date,
      dateLabel: date ? formatDayLabel(date) : null,
      count: items.length,
      items,
    };
  }

  private filterRecords(
    dataset: HumidityDataset,
    filter: HumidityFilter,
  ): HumidityRecord[] {
    const states = filter.states ?? [];
    const municipality = filter.municipality
      ? normalizeMunicipalityCode(filter.municipality)
      : null;

    return dataset.records.filter(
      (record) =>
        (states.length === 0 || states.includes(record.state)) &&
        (municipality === null || record.code === municipality) &&
        (filter.date === undefined || record.date === filter.date),
    );
  }

  private listStates(dataset: HumidityDataset): string[] {
    return Array.from(
      new Set(
        dataset.records
          .map((record) => record.state)
          .filter((state) => state.length > 0),
      ),
    ).sort();
  }

  private pickDefaultMunicipality(dataset: HumidityDataset): string | null {
    const brasilia = dataset.records.find(
      (record) => record.name.toLowerCase() === DEFAULT_MUNICIPALITY_NAME,
    );
    return (brasilia ?? dataset.records[0])?.code ?? null;
  }
}

function lastDate(dataset: HumidityDataset): string | null {
  return dataset.dates.length > 0 ? dataset.dates[dataset.dates.length - 1] : null;
}
