import { NotFoundException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { HumidityQueryService, parseStates } from "./humidity-query.service";
import { HumidityDatasetService } from "./humidity-dataset.service";
import { HumidityDataset, HumidityRecord } from "./humidity.types";

describe("HumidityQueryService", () => {
  let service: HumidityQueryService;

  const record = (
    code: string,
    name: string,
    state: string,
    date: string,
    humidityMin: number | null,
  ): HumidityRecord => ({
    code,
    name,
    state,
    latitude: -16,
    longitude: -49,
    date,
    humidityMin,
    humidityMax: null,
  });

  const dataset: HumidityDataset = {
    key: "2024-08-20",
    generatedAt: "2024-08-20T03:05:00.000Z",
    source: "inmet",
    dates: ["2024-08-20", "2024-08-21"],
    records: [
      record("5200258", "Águas Lindas de Goiás", "GO", "2024-08-20", 14),
      record("5200258", "Águas Lindas de Goiás", "GO", "2024-08-21", 33),
      record("5201108", "Anápolis", "GO", "2024-08-20", 15),
      record("5201108", "Anápolis", "GO", "2024-08-21", 61),
      record("5208707", "Goiânia", "GO", "2024-08-20", 25),
      record("5208707", "Goiânia", "GO", "2024-08-21", 45),
      record("5300108", "Brasília", "DF", "2024-08-20", 18),
      record("5300108", "Brasília", "DF", "2024-08-21", null),
    ],
  };

  const mockDatasetService = {
    getData: jest.fn(),
  };

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HumidityQueryService,
        { provide: HumidityDatasetService, useValue: mockDatasetService },
      ],
    }).compile();

    service = module.get<HumidityQueryService>(HumidityQueryService);

    jest.clearAllMocks();
    mockDatasetService.getData.mockResolvedValue(dataset);
  });

  describe("parseStates", () => {
    it("should split, trim and uppercase", () => {
      expect(parseStates(" df, go ,,sp")).toEqual(["DF", "GO", "SP"]);
    });

    it("should return an empty list for missing values", () => {
      expect(parseStates(undefined)).toEqual([]);
      expect(parseStates("")).toEqual([]);
    });
  });

  describe("getLegend", () => {
    it("should list the six classes best to worst", () => {
      const legend = service.getLegend();

      expect(legend.classes.map((severity) => severity.id)).toEqual([
        "ideal",
        "near-ideal",
        "observation",
        "attention",
        "alert",
        "emergency",
      ]);
      expect(legend.unknownColor).toBe("#9CA3AF");
    });
  });

  describe("getSummary", () => {
    it("should describe the dataset and count classes on the first date", async () => {
      const summary = await service.getSummary();

      expect(summary).toEqual({
        key: "2024-08-20",
        generatedAt: "2024-08-20T03:05:00.000Z",
        source: "inmet",
        dates: ["2024-08-20", "2024-08-21"],
        states: ["DF", "GO"],
        defaultMunicipality: "5300108",
        classCounts: {
          ideal: 0,
          "near-ideal": 0,
          observation: 0,
          attention: 1,
          alert: 3,
          emergency: 0,
          unknown: 0,
        },
      });
    });

    it("should fall back to the first municipality without Brasília", async () => {
      mockDatasetService.getData.mockResolvedValue({
        ...dataset,
        records: dataset.records.filter((r) => r.code !== "5300108"),
      });

      const summary = await service.getSummary();

      expect(summary.defaultMunicipality).toBe("5200258");
    });

    it("should have no default municipality for an empty dataset", async () => {
      mockDatasetService.getData.mockResolvedValue({
        ...dataset,
        dates: [],
        records: [],
      });

      const summary = await service.getSummary();

      expect(summary.defaultMunicipality).toBeNull();
      expect(summary.states).toEqual([]);
    });
  });

  describe("getMunicipalityOptions", () => {
    it("should list each municipality once sorted by state and name", async () => {
      const options = await service.getMunicipalityOptions();

      expect(options.map((option) => option.label)).toEqual([
        "Brasília / DF",
        "Águas Lindas de Goiás / GO",
        "Anápolis / GO",
        "Goiânia / GO",
      ]);
    });

    it("should filter by state", async () => {
      const options = await service.getMunicipalityOptions(["DF"]);

      expect(options).toEqual([
        { code: "5300108", label: "Brasília / DF", name: "Brasília", state: "DF" },
      ]);
    });
  });

  describe("getMap", () => {
    it("should default to the last date", async () => {
      const map = await service.getMap();

      expect(map.date).toBe("2024-08-21");
      expect(map.dates).toEqual(["2024-08-20", "2024-08-21"]);
      expect(map.items).toHaveLength(4);
      expect(map.items.every((item) => item.date === "2024-08-21")).toBe(true);
    });

    it("should classify each point and leave unknown values unclassified", async () => {
      const map = await service.getMap({ date: "2024-08-21", states: ["DF"] });

      expect(map.items).toHaveLength(1);
      expect(map.items[0].humidityMin).toBeNull();
      expect(map.items[0].severity).toBeNull();
    });

    it("should filter by municipality code", async () => {
      const map = await service.getMap({ municipality: "5208707" });

      expect(map.items).toHaveLength(1);
      expect(map.items[0].name).toBe("Goiânia");
      expect(map.items[0].severity?.id).toBe("near-ideal");
    });

    it("should return no items for a date outside the dataset", async () => {
      const map = await service.getMap({ date: "2024-09-01" });

      expect(map.date).toBe("2024-09-01");
      expect(map.items).toEqual([]);
    });
  });

  describe("getSeries", () => {
    it("should return the municipality days with labels", async () => {
      const series = await service.getSeries("5300108");

      expect(series.code).toBe("5300108");
      expect(series.name).toBe("Brasília");
      expect(series.items.map((item) => item.dayLabel)).toEqual([
        "20/08",
        "21/08",
      ]);
      expect(series.items.map((item) => item.severity?.id ?? null)).toEqual([
        "alert",
        null,
      ]);
    });

    it("should throw NotFoundException for an unknown code", async () => {
      await expect(service.getSeries("9999999")).rejects.toThrow(
        NotFoundException,
      );
    });
  });

  describe("getClassListing", () => {
    it("should list municipalities of a class sorted by state and name", async () => {
      const listing = await service.getClassListing("alert", {
        date: "2024-08-20",
      });

      expect(listing.severity.id).toBe("alert");
      expect(listing.date).toBe("2024-08-20");
      expect(listing.dateLabel).toBe("20/08");
      expect(listing.count).toBe(3);
      expect(listing.items).toEqual([
        { code: "5300108", name: "Brasília", state: "DF", humidityMin: 18 },
        { code: "5200258", name: "Águas Lindas de Goiás", state: "GO", humidityMin: 14 },
        { code: "5201108", name: "Anápolis", state: "GO", humidityMin: 15 },
      ]);
    });

    it("should default to the last date", async () => {
      const listing = await service.getClassListing("observation");

      expect(listing.date).toBe("2024-08-21");
      expect(listing.dateLabel).toBe("21/08");
      expect(listing.items).toEqual([
        { code: "5200258", name: "Águas Lindas de Goiás", state: "GO", humidityMin: 33 },
      ]);
    });

    it("should apply the date and state filters", async () => {
      const listing = await service.getClassListing("ideal", {
        date: "2024-08-21",
        states: ["GO"],
      });

      expect(listing.dateLabel).toBe("21/08");
      expect(listing.items.map((item) => item.code)).toEqual(["5201108"]);
    });

    it("should return an empty listing when nothing matches", async () => {
      const listing = await service.getClassListing("emergency");

      expect(listing.count).toBe(0);
      expect(listing.items).toEqual([]);
    });

    it("should throw NotFoundException for an unknown class", async () => {
      await expect(service.getClassListing("dry")).rejects.toThrow(
        NotFoundException,
      );
      expect(mockDatasetService.getData).not.toHaveBeenCalled();
    });
  });
});
