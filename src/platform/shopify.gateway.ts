import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios from 'axios';
import { PLATFORM_REQUEST_TIMEOUT_MS } from '../common/constants';
import { isRecord } from '../common/json';
import { err, ok } from '../common/result';
import { PlatformApi, PlatformGateway, PlatformResult } from './platform-api';
import type { AccessGrant } from './platform.types';
import { ShopifyClient, toFailure } from './shopify.client';

@Injectable()
export class ShopifyGateway extends PlatformGateway {
  constructor(private readonly config: ConfigService) {
    super();
  }

  forTenant(shopDomain: string, accessToken: string): PlatformApi {
    const apiVersion = this.config.get<string>('platform.apiVersion', '2025-04');

    const api = axios.create({
      baseURL: `https://${shopDomain}/admin/api/${apiVersion}`,
      headers: {
        'X-Shopify-Access-Token': accessToken,
        'Content-Type': 'application/json',
      },
      timeout: PLATFORM_REQUEST_TIMEOUT_MS,
    });
    const files = axios.create({ timeout: PLATFORM_REQUEST_TIMEOUT_MS });

    return new ShopifyClient(shopDomain, api, files);
  }

  authorizeUrl(shopDomain: string, state: string): string {
    const params = new URLSearchParams({
      client_id: this.config.get<string>('platform.apiKey', ''),
      scope: this.config.get<string[]>('platform.scopes', []).join(','),
      redirect_uri: this.config.get<string>('platform.redirectUri', ''),
      state,
    });
    return `https://${shopDomain}/admin/oauth/authorize?${params.toString()}`;
  }

  async exchangeCode(shopDomain: string, code: string): PlatformResult<AccessGrant> {
    let body: unknown;
    try {
      const response = await axios.post<unknown>(
        `https://${shopDomain}/admin/oauth/access_token`,
        {
          client_id: this.config.get<string>('platform.apiKey', ''),
          client_secret: this.config.get<string>('platform.apiSecret', ''),
          code,
        },
        { timeout: PLATFORM_REQUEST_TIMEOUT_MS },
      );
      body = response.data;
    } catch (error) {
      return err(toFailure(error));
    }

    const token = isRecord(body) ? body.access_token : undefined;
    if (!isRecord(body) || typeof token !== 'string' || token === '') {
      return err({ kind: 'malformed', message: 'token response without access_token' });
    }

    const scope = body.scope;
    return ok({
      accessToken: token,
      scopes: typeof scope === 'string' ? scope.split(',').filter(Boolean) : [],
    });
  }
}
