// src/server.ts

import { loadSettings } from './config/settings';
import { ConfigSourceManager } from './ingest/configSource';
import { createApp } from './app';
import { logger, setLogLevel } from './utils/logger';

const settings = loadSettings();
setLogLevel(settings.logLevel);

const configSource = new ConfigSourceManager(settings.parametersCsvPath);
const app = createApp({ settings, configSource });

app.listen(settings.port, () => {
    const active = configSource.getActive();
    logger.info(`Specialty capacity engine running on port ${settings.port}`);
    logger.info(`Using ${active.label} (${active.configs.length} specialties)`);
});
