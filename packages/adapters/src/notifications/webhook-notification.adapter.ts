import { fetch, type Dispatcher } from 'undici';
import type { NotificationDispatcherPort, NotificationRequest } from '@field-visit/domain';

/** Hands each notification to an external push gateway as a JSON POST. */
export class WebhookNotificationDispatcher implements NotificationDispatcherPort {
  constructor(
    private readonly url: string,
    private readonly dispatcher?: Dispatcher,
  ) {}

  async dispatch(request: NotificationRequest): Promise<void> {
    const resp = await fetch(this.url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(request),
      ...(this.dispatcher ? { dispatcher: this.dispatcher } : {}),
    });
    if (!resp.ok) {
      throw new Error(`notification webhook responded ${resp.status}`);
    }
  }
}

/** Used when no webhook is configured. */
export class ConsoleNotificationDispatcher implements NotificationDispatcherPort {
  async dispatch(request: NotificationRequest): Promise<void> {
    console.log(`[notify] ${request.metadata.type} -> ${request.userId}: ${request.title} | ${request.body}`);
  }
}
