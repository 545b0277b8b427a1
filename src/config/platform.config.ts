import { registerAs } from '@nestjs/config';

export default registerAs('platform', () => ({
  apiKey: process.env.SHOPIFY_API_KEY || '',
  apiSecret: process.env.SHOPIFY_API_SECRET || '',
  apiVersion: process.env.SHOPIFY_API_VERSION || '2025-04',
  scopes: (
    process.env.SHOPIFY_APP_SCOPES ||
    'read_products,read_orders,read_customers,write_pixels,read_customer_events'
  )
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean),
  appUrl: (process.env.SHOPIFY_APP_URL || 'http://localhost:8080').replace(/\/+$/, ''),
  redirectUri:
    process.env.SHOPIFY_REDIRECT_URI || 'http://localhost:8080/api/auth/shopify/callback',
}));
