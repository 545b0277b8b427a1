import databaseConfig from './database.config';
import ingestionConfig from './ingestion.config';
import jobsConfig from './jobs.config';
import platformConfig from './platform.config';

/** Every config namespace, for ConfigModule.forRoot({ load }) in both processes */
export const configNamespaces = [databaseConfig, platformConfig, jobsConfig, ingestionConfig];
