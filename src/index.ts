import express from 'express';
import routes from './routes.js';
import { errorHandler } from './middleware/error-handler.js';
import { loadSampleData } from './domain/party-service.js';
import { config } from './config.js';
import { logger } from './logger.js';

const app = express();

// Middleware
app.use(express.json());

// Routes
app.use(routes);

// Health check
app.get('/health', (req, res) => {
  res.status(200).json({ status: 'ok' });
});

app.use(errorHandler);

// Sample data (for development)
if (config.NODE_ENV !== 'production' && !process.env.VITEST) {
  const { guests, menuItems } = loadSampleData({
    seed: config.SAMPLE_DATA_SEED,
    guestCount: 6,
  });
  logger.info({ guests: guests.length, menuItems: menuItems.length }, 'Sample data loaded');
}

// Start server only if not in test mode
if (!process.env.VITEST) {
  app.listen(config.PORT, () => {
    logger.info(`Party planner running on port ${config.PORT}`);
  });
}

export default app;
