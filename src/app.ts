import { resolve } from 'path';
import { config as appConfig, type Config } from './config/index.js';
import { loadBusinessConfig, type BusinessConfig } from './config/catalog.js';
import { JsonlActivityLog } from './core/activity/activity-log.js';
import {
  activityLogPath,
  createPipeline,
  type PipelineService,
} from './core/pipeline/pipeline.service.js';

export interface Application {
  business: BusinessConfig;
  pipeline: PipelineService;
  activity: JsonlActivityLog;
  dataDir: string;
}

/**
 * Load the business configuration and wire the file-backed pipeline
 */
export function createApplication(config: Config = appConfig): Application {
  const business = loadBusinessConfig(resolve(config.paths.configDir));
  const dataDir = resolve(config.paths.dataDir);
  const activity = new JsonlActivityLog(activityLogPath(dataDir));

  const pipeline = createPipeline(business, {
    dataDir,
    quantityWindow: config.extraction.quantityWindow,
    activity,
  });

  return { business, pipeline, activity, dataDir };
}
