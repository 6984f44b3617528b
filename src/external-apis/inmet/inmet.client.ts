import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import { getHumidityConfig } from "../../config/humidity.config";

/**
 * INMET Forecast API Client
 *
 * Municipality forecast by IBGE code:
 * https://apiprevmet3.inmet.gov.br/previsao/{ibge}
 *
 * The client never throws. A timeout, network error, non-200 status or a
 * body that is not JSON yields null and the municipality stays unknown.
 * There are no retries; a failed municipality stays unknown until the next
 * collection run.
 */
@Injectable()
export class InmetClient {
  private readonly logger = new Logger(InmetClient.name);
  private readonly client: AxiosInstance;
  private readonly urlTemplate: string;

  constructor(private readonly configService: ConfigService) {
    const config = getHumidityConfig(this.configService);
    this.urlTemplate = config.forecastUrlTemplate;
    this.client = axios.create({
      timeout: config.requestTimeoutMs,
      headers: {
        Accept: "application/json",
        "User-Agent": "umidade-api/1.0",
      },
      // Status handling happens below; axios must not throw on 4xx/5xx
      validateStatus: () => true,
    });
  }

  buildUrl(code: string): string {
    return this.urlTemplate.split("{ibge}").join(encodeURIComponent(code));
  }

  /**
   * Fetch the raw forecast body for one municipality.
   *
   * @returns The decoded JSON body, or null when nothing usable came back
   */
  async getForecast(code: string): Promise<unknown> {
    const url = this.buildUrl(code);

    try {
      const response = await this.client.get<unknown>(url);

      if (response.status !== 200) {
        this.logger.debug(`INMET ${code}: HTTP ${response.status}`);
        return null;
      }

      // axios hands back the raw text when the body is not valid JSON
      const body: unknown = response.data;
      if (typeof body !== "object" || body === null) {
        this.logger.debug(`INMET ${code}: response body is not JSON`);
        return null;
      }

      return body;
    } catch (error: unknown) {
      if (axios.isAxiosError(error)) {
        this.logger.debug(
          `INMET ${code}: request failed (${error.code ?? "no code"}): ${error.message}`,
        );
      } else {
        const errorMessage =
          error instanceof Error ? error.message : String(error);
        this.logger.debug(`INMET ${code}: request failed: ${errorMessage}`);
      }
      return null;
    }
  }
}
