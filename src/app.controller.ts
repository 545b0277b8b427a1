import { Controller, Get } from '@nestjs/common';
import { ApiExcludeEndpoint } from '@nestjs/swagger';

@Controller()
export class AppController {
  @Get()
  @ApiExcludeEndpoint()
  index() {
    return {
      name: 'Storefront Signals API',
      description:
        'Platform app backend: signed webhooks, privacy requests, storefront events and background data pulls.',
      version: '1.0.0',
      docs: '/docs',
      health: '/health',
      endpoints: {
        connect: 'GET /api/auth/shopify/connect?shop=',
        oauth_callback: 'GET /api/auth/shopify/callback',
        webhooks: 'POST /webhooks',
        activate_extension: 'POST /api/auth/shopify/activate-extension',
        update_extension: 'POST /api/auth/shopify/update-extension',
        extension_status: 'GET /api/auth/shopify/extension-status?shop=',
        ingest_event: 'POST /api/data/shopify/event',
        start_pull: 'POST /api/data-pull/start',
        start_resource_pull: 'POST /api/data-pull/{customers|products|orders}',
        pull_status: 'GET /api/data-pull/status/{job_id}',
        pull_results: 'GET /api/data-pull/results/{shop}/{job_id}?resource_type=',
      },
    };
  }
}
