/**
 * Slack Notification Service
 *
 * Slack Webhook APIを使用してエスカレーションを通知する。
 */

import { v4 as uuidv4 } from 'uuid';
import {
  createConsoleLogger,
  type EscalationNotifier,
  type WorkflowLogger,
} from '@taskflow/workflow-spec';
import { NotificationDeliveryError } from '@taskflow/runner';

interface SlackTextObject {
  type: 'plain_text' | 'mrkdwn';
  text: string;
  emoji?: boolean;
}

interface SlackBlock {
  type: 'header' | 'section' | 'context';
  text?: SlackTextObject;
  elements?: SlackTextObject[];
}

export interface SlackPayload {
  channel: string;
  text: string;
  blocks: SlackBlock[];
}

export interface SlackNotifierOptions {
  webhookUrl: string;
  logger?: WorkflowLogger;
}

/**
 * 本文の1行目をヘッダー、残りをセクションにする
 */
export function buildSlackPayload(target: string, message: string, deliveryId: string): SlackPayload {
  const [title, ...rest] = message.split('\n');
  const body = rest.join('\n').trim();

  const blocks: SlackBlock[] = [
    {
      type: 'header',
      text: { type: 'plain_text', text: title, emoji: true },
    },
  ];
  if (body.length > 0) {
    blocks.push({ type: 'section', text: { type: 'mrkdwn', text: body } });
  }
  blocks.push({
    type: 'context',
    elements: [{ type: 'mrkdwn', text: `*配信ID:* ${deliveryId}` }],
  });

  return { channel: target, text: message, blocks };
}

/**
 * Slack Webhook によるエスカレーション通知
 */
export class SlackEscalationNotifier implements EscalationNotifier {
  private readonly webhookUrl: string;
  private readonly logger: WorkflowLogger;

  constructor(options: SlackNotifierOptions) {
    this.webhookUrl = options.webhookUrl;
    this.logger = options.logger ?? createConsoleLogger('Slack');
  }

  async send(target: string, message: string): Promise<string> {
    const deliveryId = uuidv4();

    const response = await fetch(this.webhookUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(buildSlackPayload(target, message, deliveryId)),
    });

    if (!response.ok) {
      const errorText = await response.text();
      this.logger.error('Failed to send notification', { status: response.status, error: errorText });
      throw new NotificationDeliveryError(`Slack webhook responded with ${response.status}`, response.status);
    }

    this.logger.info('Notification sent successfully', { target, delivery_id: deliveryId });
    return deliveryId;
  }
}
