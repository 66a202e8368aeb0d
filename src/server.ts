import { loadEnv } from './config/env';
loadEnv();

import { createApp } from './app';
import { logger } from './config/logger';
import { getSettings } from './config/settings';
import { createDiarizationService } from './services/diarization.service';

const startServer = async () => {
  try {
    const settings = getSettings();

    // Engines and cloud clients are created once and shared by all requests
    const service = await createDiarizationService(settings);

    const app = createApp(service, {
      corsOrigin: settings.FRONTEND_URL,
      maxFileSize: settings.MAX_FILE_SIZE,
    });

    app.listen(settings.PORT, () => {
      logger.info(`Server running on port ${settings.PORT}`);
      logger.info(`Environment: ${settings.NODE_ENV}`);
      logger.info(
        `Transcription: ${settings.TRANSCRIPTION_PROVIDER}, speakers: ${settings.SPEAKER_SOURCE}`
      );
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

// Handle unhandled rejections
process.on('unhandledRejection', (err: unknown) => {
  logger.error('Unhandled Rejection:', err);
  process.exit(1);
});

void startServer();
