import { sanitizeHumidityRows } from "./dataset-sanitizer";
import { PipelineContractError } from "../common/errors/humidity-pipeline.error";

describe("sanitizeHumidityRows", () => {
  const baseRow = {
    code: "5300108",
    name: "Brasília",
    state: "DF",
    latitude: -15.78,
    longitude: -47.93,
    date: "2024-01-01",
    humidityMin: 18,
  };

  it("should reject tables missing required columns", () => {
    const { humidityMin: _humidityMin, state: _state, ...incomplete } = baseRow;

    expect(() => sanitizeHumidityRows([incomplete])).toThrow(
      PipelineContractError,
    );

    try {
      sanitizeHumidityRows([incomplete]);
    } catch (error) {
      expect(error).toBeInstanceOf(PipelineContractError);
      if (error instanceof PipelineContractError) {
        expect(error.missingColumns).toEqual(["state", "humidityMin"]);
      }
    }
  });

  it("should fill the optional maximum humidity", () => {
    const [record] = sanitizeHumidityRows([baseRow]);

    expect(record).toEqual({
      code: "5300108",
      name: "Brasília",
      state: "DF",
      latitude: -15.78,
      longitude: -47.93,
      date: "2024-01-01",
      humidityMin: 18,
      humidityMax: null,
    });
  });

  it("should coerce codes, dates and numbers", () => {
    const [record] = sanitizeHumidityRows([
      {
        ...baseRow,
        code: 110001,
        date: "2024-01-01T09:00:00",
        latitude: "-11.93",
        humidityMin: "n/d",
        humidityMax: "80",
      },
    ]);

    expect(record.code).toBe("0110001");
    expect(record.date).toBe("2024-01-01");
    expect(record.latitude).toBe(-11.93);
    expect(record.humidityMin).toBeNull();
    expect(record.humidityMax).toBe(80);
  });

  it("should convert Date instances using the operating timezone", () => {
    const [record] = sanitizeHumidityRows(
      [{ ...baseRow, date: new Date("2024-01-02T01:00:00Z") }],
      { timeZone: "America/Sao_Paulo" },
    );

    expect(record.date).toBe("2024-01-01");
  });

  it("should drop rows without a readable code or date", () => {
    const result = sanitizeHumidityRows([
      baseRow,
      { ...baseRow, code: "sem código" },
      { ...baseRow, date: "amanhã" },
    ]);

    expect(result).toHaveLength(1);
  });

  it("should sort by code and date", () => {
    const result = sanitizeHumidityRows([
      { ...baseRow, code: "5300108", date: "2024-01-02" },
      { ...baseRow, code: "3550308", date: "2024-01-01" },
      { ...baseRow, code: "5300108", date: "2024-01-01" },
    ]);

    expect(result.map((r) => `${r.code}@${r.date}`)).toEqual([
      "3550308@2024-01-01",
      "5300108@2024-01-01",
      "5300108@2024-01-02",
    ]);
  });

  it("should be idempotent", () => {
    const once = sanitizeHumidityRows([
      { ...baseRow, date: "2024-01-02", humidityMin: "22" },
      { ...baseRow, code: 3550308, humidityMin: null },
    ]);

    const twice = sanitizeHumidityRows(once);

    expect(twice).toEqual(once);
  });

  it("should freeze the result", () => {
    const result = sanitizeHumidityRows([baseRow]);

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result[0])).toBe(true);
  });
});
