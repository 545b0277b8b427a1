import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { REQUIRED_WEBHOOK_TOPICS, RequiredWebhookTopic, WEBHOOK_CALLBACK_PATH } from '../common/constants';
import { PlatformGateway } from '../platform/platform-api';
import { describeFailure, PlatformFailure } from '../platform/platform.types';

export type RegistrationOutcome = 'existing' | 'registered' | 'already_taken' | 'failed';

export interface TopicRegistration {
  topic: RequiredWebhookTopic;
  outcome: RegistrationOutcome;
  detail?: string;
}

const isAlreadyTaken = (failure: PlatformFailure) =>
  failure.kind === 'user_errors' && failure.errors.some((e) => /already been taken/i.test(e.message));

/**
 * Makes sure every required topic is subscribed at our callback URL. Safe to run
 * on every install: matching subscriptions are left alone.
 */
@Injectable()
export class WebhookRegistrationService {
  private readonly logger = new Logger(WebhookRegistrationService.name);

  constructor(
    private readonly gateway: PlatformGateway,
    private readonly config: ConfigService,
  ) {}

  callbackUrl(): string {
    return `${this.config.get<string>('platform.appUrl', '')}${WEBHOOK_CALLBACK_PATH}`;
  }

  async reconcile(
    shop: string,
    accessToken: string,
    callbackUrl: string = this.callbackUrl(),
  ): Promise<TopicRegistration[]> {
    const api = this.gateway.forTenant(shop, accessToken);

    const registered = new Set<string>();
    const listed = await api.listWebhookSubscriptions();
    if (listed.ok) {
      for (const subscription of listed.value) {
        if (subscription.callbackUrl === callbackUrl) registered.add(subscription.topic);
      }
    } else {
      this.logger.warn(
        `Could not list webhooks for ${shop} (${describeFailure(listed.error)}); registering every topic`,
      );
    }

    const report: TopicRegistration[] = [];
    for (const topic of REQUIRED_WEBHOOK_TOPICS) {
      if (registered.has(topic)) {
        report.push({ topic, outcome: 'existing' });
        continue;
      }

      const created = await api.createWebhookSubscription(topic, callbackUrl);
      if (created.ok) {
        report.push({ topic, outcome: 'registered' });
      } else if (isAlreadyTaken(created.error)) {
        report.push({ topic, outcome: 'already_taken' });
      } else {
        const detail = describeFailure(created.error);
        this.logger.error(`Failed to register ${topic} for ${shop}: ${detail}`);
        report.push({ topic, outcome: 'failed', detail });
      }
    }

    const failed = report.filter((r) => r.outcome === 'failed').length;
    this.logger.log(
      `Webhooks for ${shop}: ${report.length - failed}/${report.length} topics in place at ${callbackUrl}`,
    );
    return report;
  }
}
