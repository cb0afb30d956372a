import { AppConfig, IngestionSettings } from '../config/environment';
import { DatabaseService } from '../config/database';
import { ensureSchema } from '../db/schema';
import { AlphaVantageRepository } from '../repositories/alpha-vantage-repository';
import { OpenMeteoRepository } from '../repositories/open-meteo-repository';
import { StockDataRepository } from '../repositories/stock-data-repository';
import { WeatherDataRepository } from '../repositories/weather-data-repository';
import { IngestionStage, RunStatus } from '../types/common/enums';
import { IngestionRunResult, VerificationReport } from '../types/models/ingestion';
import { StockRecord } from '../types/models/stock';
import { City, OpenMeteoDaily, WeatherRecord } from '../types/models/weather';
import { AppError } from '../utils/errors/app-error';
import { logger } from '../utils/logger';
import { transformStockData } from './stock-transformer';
import { transformWeatherData } from './weather-transformer';

export interface IngestionOptions extends IngestionSettings {
  /** Create the raw tables on connect when missing */
  ensureSchema: boolean;
}

/**
 * Runs one fetch → transform → load → verify pass.
 *
 * Stages execute strictly in order and the first failure ends the run. Per-record
 * conversion problems are not failures: those records are skipped during TRANSFORM.
 * The database connection, once opened, is closed whatever the outcome.
 */
export class IngestionService {
  private readonly stockData: StockDataRepository;
  private readonly weatherData: WeatherDataRepository;
  private stage: IngestionStage = IngestionStage.INIT;

  constructor(
    private readonly options: IngestionOptions,
    private readonly stockApi: AlphaVantageRepository,
    private readonly weatherApi: OpenMeteoRepository,
    private readonly db: DatabaseService
  ) {
    this.stockData = new StockDataRepository(db);
    this.weatherData = new WeatherDataRepository(db);
  }

  /**
   * Wires the service from a loaded configuration
   */
  public static initialize(config: AppConfig): IngestionService {
    return new IngestionService(
      { ...config.ingestion, ensureSchema: config.database.ensureSchema },
      new AlphaVantageRepository(config.alphaVantage),
      new OpenMeteoRepository(config.weatherApi),
      new DatabaseService(config.database)
    );
  }

  private enter(stage: IngestionStage): void {
    this.stage = stage;
    logger.info('ingestion_stage', { stage });
  }

  async run(): Promise<IngestionRunResult> {
    const startTime = Date.now();
    const result: IngestionRunResult = {
      status: RunStatus.FAILURE,
      stage: IngestionStage.INIT,
      stockRecords: { accepted: 0, skipped: 0 },
      weatherRecords: { accepted: 0, skipped: 0 },
      stockUpserted: 0,
      weatherUpserted: 0,
      durationMs: 0,
    };
    this.stage = IngestionStage.INIT;

    logger.info('ingestion_started', {
      symbol: this.options.symbol,
      cities: this.options.cities.map(city => city.name),
      ...this.options.weatherRange,
    });

    try {
      this.enter(IngestionStage.FETCH_STOCK);
      const series = await this.stockApi.fetchDailyAdjusted(this.options.symbol, this.options.outputSize);

      this.enter(IngestionStage.FETCH_WEATHER);
      const histories: Array<{ city: City; daily: OpenMeteoDaily }> = [];
      for (const city of this.options.cities) {
        const daily = await this.weatherApi.fetchDailyHistory(city, this.options.weatherRange);
        histories.push({ city, daily });
      }

      this.enter(IngestionStage.TRANSFORM);
      const stock = transformStockData(series, { windowDays: this.options.windowDays });
      result.stockRecords = stock.summary;

      const weatherRecords: WeatherRecord[] = [];
      for (const { city, daily } of histories) {
        const weather = transformWeatherData(city.name, daily);
        weatherRecords.push(...weather.records);
        result.weatherRecords = {
          accepted: result.weatherRecords.accepted + weather.summary.accepted,
          skipped: result.weatherRecords.skipped + weather.summary.skipped,
        };
      }
      this.assertLoadable(stock.records, weatherRecords);

      this.enter(IngestionStage.CONNECT);
      await this.db.connect();
      if (this.options.ensureSchema) {
        await ensureSchema(this.db);
      }

      this.enter(IngestionStage.LOAD_STOCK);
      result.stockUpserted = await this.stockData.upsertMany(stock.records);

      this.enter(IngestionStage.LOAD_WEATHER);
      result.weatherUpserted = await this.weatherData.upsertMany(weatherRecords);

      this.enter(IngestionStage.VERIFY);
      const verification = await this.verify();
      result.verification = verification;
      if (!verification.ok) {
        throw new AppError('Verification failed: both tables must contain at least one row', 'VERIFICATION_FAILED', true, {
          stockCount: verification.stock.totalCount,
          weatherCount: verification.weather.totalCount,
        });
      }

      result.status = RunStatus.SUCCESS;
      result.stage = IngestionStage.SUCCESS;
      logger.info('ingestion_completed', {
        stockUpserted: result.stockUpserted,
        weatherUpserted: result.weatherUpserted,
      });
    } catch (error) {
      result.status = RunStatus.FAILURE;
      result.stage = this.stage;
      result.error = error instanceof Error ? error : new AppError(String(error));
      logger.error('ingestion_failed', { stage: this.stage, error: result.error });
    } finally {
      await this.db.close();
      result.durationMs = Date.now() - startTime;
    }

    return result;
  }

  private assertLoadable(stockRecords: StockRecord[], weatherRecords: WeatherRecord[]): void {
    if (stockRecords.length === 0) {
      throw new AppError('No valid stock records to load', 'NO_STOCK_RECORDS');
    }
    if (weatherRecords.length === 0) {
      throw new AppError('No valid weather records to load', 'NO_WEATHER_RECORDS');
    }
  }

  /**
   * Read-only checks after both loads; ok only when both tables hold rows
   */
  async verify(): Promise<VerificationReport> {
    const stock = await this.stockData.summarize();
    const weather = await this.weatherData.summarize();
    const latestStock = await this.stockData.findLatest();

    logger.info('verification_complete', {
      stock,
      weather,
      latestStock,
    });

    return {
      stock,
      weather,
      latestStock,
      ok: stock.totalCount > 0 && weather.totalCount > 0,
    };
  }
}
