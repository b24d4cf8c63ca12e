import { parseCalibrationDescriptor } from '../engine/descriptors';
import type { CalibrationParams } from '../engine/descriptors';
import { buildTeamsFromCalibration } from './calibration';
import { loadCalibrationFile, parseForecastEnv } from './cli';
import defaultField from './default-field.json';
import { resolveForecastConfig } from './forecast-config';
import { ChampionshipForecaster } from './forecaster';

function builtInField(): CalibrationParams {
  const parsed = parseCalibrationDescriptor(defaultField);
  if (!parsed.ok) throw new Error(`default field: ${parsed.error.message}`);
  return parsed.value;
}

function main(): void {
  const env = parseForecastEnv(process.env);
  if (!env.ok) {
    console.error(`[forecast] ${env.error}`);
    process.exit(1);
  }

  const { overrides, calendarId, calibrationPath } = env.value;
  const params = calibrationPath ? loadCalibrationFile(calibrationPath) : builtInField();

  const forecaster = new ChampionshipForecaster(
    calendarId,
    buildTeamsFromCalibration(params),
    resolveForecastConfig(overrides),
  );
  const forecast = forecaster.forecastSeason();
  for (const line of forecaster.summarize(forecast)) {
    console.log(line);
  }
}

try {
  main();
} catch (err) {
  console.error(`[forecast] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
}
