import { Injectable, Logger, OnModuleInit } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Municipality } from "./municipality.types";
import { MunicipalityLoaderService } from "./municipality-loader.service";
import { getHumidityConfig } from "../config/humidity.config";

/**
 * Municipality Registry
 *
 * Holds the reference municipalities for the lifetime of the process.
 * The file is read once during module init, so a missing or malformed
 * reference file stops the application before it starts serving.
 */
@Injectable()
export class MunicipalityRegistry implements OnModuleInit {
  private readonly logger = new Logger(MunicipalityRegistry.name);
  private municipalities: readonly Municipality[] = [];
  private loaded = false;

  constructor(
    private readonly configService: ConfigService,
    private readonly loader: MunicipalityLoaderService,
  ) {}

  async onModuleInit(): Promise<void> {
    await this.reload();
  }

  async reload(): Promise<void> {
    const { municipalitiesPath } = getHumidityConfig(this.configService);
    const loaded = await this.loader.load(municipalitiesPath);
    this.municipalities = Object.freeze(loaded.map((m) => Object.freeze(m)));
    this.loaded = true;
  }

  /**
   * Municipalities to collect, honouring the MAX_MUN limit (0 = all).
   */
  list(): readonly Municipality[] {
    if (!this.loaded) {
      this.logger.warn("Municipality registry used before it was loaded");
    }
    const { maxMunicipalities } = getHumidityConfig(this.configService);
    return maxMunicipalities > 0
      ? this.municipalities.slice(0, maxMunicipalities)
      : this.municipalities;
  }

  get size(): number {
    return this.municipalities.length;
  }
}
