/**
 * Stages of a single ingestion run, in execution order
 */
export enum IngestionStage {
  INIT = 'INIT',
  FETCH_STOCK = 'FETCH_STOCK',
  FETCH_WEATHER = 'FETCH_WEATHER',
  TRANSFORM = 'TRANSFORM',
  CONNECT = 'CONNECT',
  LOAD_STOCK = 'LOAD_STOCK',
  LOAD_WEATHER = 'LOAD_WEATHER',
  VERIFY = 'VERIFY',
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE'
}

/**
 * Terminal state of a run
 */
export enum RunStatus {
  SUCCESS = 'SUCCESS',
  FAILURE = 'FAILURE'
}

/**
 * Coarse daily condition derived from precipitation
 */
export enum WeatherCondition {
  CLEAR = 'Clear',
  PRECIPITATION = 'Precipitation'
}
