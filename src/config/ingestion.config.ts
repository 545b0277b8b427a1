import { registerAs } from '@nestjs/config';

export default registerAs('ingestion', () => ({
  rateLimit: parseInt(process.env.EVENT_RATE_LIMIT || '100', 10),
  rateWindowSeconds: parseInt(process.env.EVENT_RATE_WINDOW_SECONDS || '60', 10),
}));
