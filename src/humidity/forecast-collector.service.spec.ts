import { Test, TestingModule } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { Logger } from "@nestjs/common";
import { ForecastCollectorService } from "./forecast-collector.service";
import { InmetClient } from "../external-apis/inmet/inmet.client";
import { Municipality } from "../municipalities/municipality.types";
import { classifyHumidity } from "./humidity-classifier";

describe("ForecastCollectorService", () => {
  let collector: ForecastCollectorService;

  const mockInmetClient = {
    getForecast: jest.fn(),
  };

  const targetDates = [
    "2024-01-01",
    "2024-01-02",
    "2024-01-03",
    "2024-01-04",
    "2024-01-05",
  ];

  const municipality = (code: string, name = `Município ${code}`): Municipality => ({
    code,
    name,
    state: "GO",
    latitude: -16,
    longitude: -49,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ForecastCollectorService,
        { provide: InmetClient, useValue: mockInmetClient },
        {
          provide: ConfigService,
          useValue: new ConfigService({ MAX_WORKERS: "4" }),
        },
      ],
    }).compile();

    collector = module.get<ForecastCollectorService>(ForecastCollectorService);
    jest.clearAllMocks();
  });

  it("should build one classified sample from a keyed-by-municipality body", async () => {
    mockInmetClient.getForecast.mockResolvedValue({
      "5300108": { "2024-01-01": { umidade_min: 18 } },
    });

    const rows = await collector.collect(
      [
        {
          code: "5300108",
          name: "Brasília",
          state: "DF",
          latitude: -15.78,
          longitude: -47.93,
        },
      ],
      ["2024-01-01"],
    );

    expect(rows).toEqual([
      {
        code: "5300108",
        name: "Brasília",
        state: "DF",
        latitude: -15.78,
        longitude: -47.93,
        date: "2024-01-01",
        humidityMin: 18,
        humidityMax: null,
      },
    ]);
    expect(classifyHumidity(rows[0].humidityMin)?.id).toBe("alert");
  });

  it("should emit five rows per municipality, unknown where data is missing", async () => {
    mockInmetClient.getForecast.mockResolvedValue({
      "2024-01-01": { umidade_min: 40 },
      "2024-01-03": { umidade_min: 25 },
    });

    const rows = await collector.collect([municipality("5208707")], targetDates);

    expect(rows.map((row) => [row.date, row.humidityMin])).toEqual([
      ["2024-01-01", 40],
      ["2024-01-02", null],
      ["2024-01-03", 25],
      ["2024-01-04", null],
      ["2024-01-05", null],
    ]);
  });

  it("should keep other municipalities when one request fails", async () => {
    mockInmetClient.getForecast.mockImplementation(async (code: string) => {
      if (code === "0000002") {
        return null; // HTTP 500 upstream
      }
      return { [code]: { "2024-01-02": { umidade_min: 50 } } };
    });

    const municipalities = [
      municipality("0000001"),
      municipality("0000002"),
      municipality("0000003"),
    ];

    const rows = await collector.collect(municipalities, targetDates);

    expect(rows).toHaveLength(15);
    const failed = rows.filter((row) => row.code === "0000002");
    expect(failed).toHaveLength(5);
    expect(failed.every((row) => row.humidityMin === null)).toBe(true);
    expect(failed.every((row) => classifyHumidity(row.humidityMin) === undefined)).toBe(true);

    const healthy = rows.filter(
      (row) => row.code !== "0000002" && row.date === "2024-01-02",
    );
    expect(healthy.map((row) => row.humidityMin)).toEqual([50, 50]);
  });

  it("should survive a client that throws", async () => {
    mockInmetClient.getForecast.mockRejectedValue(new Error("socket hang up"));

    const rows = await collector.collect(
      [municipality("0000001"), municipality("0000002")],
      targetDates,
    );

    expect(rows).toHaveLength(10);
    expect(rows.every((row) => row.humidityMin === null)).toBe(true);
  });

  it("should always return N x 5 rows", async () => {
    mockInmetClient.getForecast.mockImplementation(async (code: string) =>
      Number(code) % 3 === 0
        ? null
        : { [code]: { "2024-01-04": { ur_min: Number(code) } } },
    );

    const municipalities = Array.from({ length: 23 }, (_, i) =>
      municipality(String(i + 1).padStart(7, "0")),
    );

    const rows = await collector.collect(municipalities, targetDates);

    expect(rows).toHaveLength(23 * 5);
    for (const m of municipalities) {
      expect(rows.filter((row) => row.code === m.code)).toHaveLength(5);
    }
  });

  it("should never run more requests at once than the worker count", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    mockInmetClient.getForecast.mockImplementation(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return {};
    });

    const municipalities = Array.from({ length: 12 }, (_, i) =>
      municipality(String(i + 1).padStart(7, "0")),
    );

    await collector.collect(municipalities, targetDates);

    expect(mockInmetClient.getForecast).toHaveBeenCalledTimes(12);
    expect(maxInFlight).toBe(4);
  });

  it("should honour an explicit worker count", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    mockInmetClient.getForecast.mockImplementation(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return null;
    });

    await collector.collect(
      [municipality("0000001"), municipality("0000002"), municipality("0000003")],
      targetDates,
      { workers: 1 },
    );

    expect(maxInFlight).toBe(1);
  });

  it("should warn but still return the table when nothing is known", async () => {
    const warnSpy = jest.spyOn(Logger.prototype, "warn").mockImplementation();
    mockInmetClient.getForecast.mockResolvedValue(null);

    const rows = await collector.collect([municipality("0000001")], targetDates);

    expect(rows).toHaveLength(5);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    warnSpy.mockRestore();
  });

  describe("cooperative pause", () => {
    afterEach(() => {
      jest.useRealTimers();
    });

    it("should pause a worker every 10 rows while the others keep fetching", async () => {
      jest.useFakeTimers();
      const setTimeoutSpy = jest.spyOn(global, "setTimeout");
      const logSpy = jest.spyOn(Logger.prototype, "log").mockImplementation();
      const warnSpy = jest.spyOn(Logger.prototype, "warn").mockImplementation();
      mockInmetClient.getForecast.mockResolvedValue(null);

      const municipalities = ["1", "2", "3", "4", "5", "6"].map((code) =>
        municipality(code.padStart(7, "0")),
      );
      const pauses = () =>
        setTimeoutSpy.mock.calls.filter(([, delay]) => delay === 50).length;

      let finished = false;
      const collecting = collector
        .collect(municipalities, targetDates, {
          workers: 2,
          pauseEvery: 10,
          pauseMs: 50,
        })
        .then((rows) => {
          finished = true;
          return rows;
        });

      // One worker pauses at row 10 while the other fetches on to row 20
      await jest.advanceTimersByTimeAsync(0);
      expect(mockInmetClient.getForecast).toHaveBeenCalledTimes(4);
      expect(pauses()).toBe(2);
      expect(finished).toBe(false);

      await jest.advanceTimersByTimeAsync(49);
      expect(mockInmetClient.getForecast).toHaveBeenCalledTimes(4);

      // After 50ms the last two are fetched and row 30 pauses again
      await jest.advanceTimersByTimeAsync(1);
      expect(mockInmetClient.getForecast).toHaveBeenCalledTimes(6);
      expect(pauses()).toBe(3);
      expect(finished).toBe(false);

      await jest.advanceTimersByTimeAsync(50);
      const rows = await collecting;

      expect(finished).toBe(true);
      expect(rows).toHaveLength(30);

      setTimeoutSpy.mockRestore();
      logSpy.mockRestore();
      warnSpy.mockRestore();
    });
  });
});
