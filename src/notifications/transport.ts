// src/notifications/transport.ts
//
// One webhook POST per message. Failures surface as HttpError so the
// dispatcher's retry policy can classify them.

import { FetchFn, requestText } from '../http';
import { Message, NotificationTarget } from './types';

const DISCORD_SCHEME = /^discord:\/\/([^/]+)\/([^/?#]+)/i;

/** `discord://<id>/<token>` shorthand to the real webhook URL; other URLs pass through. */
export function resolveWebhookUrl(url: string): string {
    const m = DISCORD_SCHEME.exec(url);
    if (!m) return url;
    return `https://discord.com/api/webhooks/${m[1]}/${m[2]}`;
}

export function payloadFor(target: NotificationTarget, msg: Message): Record<string, string> {
    if (target.service === 'discord') return { content: msg.body };
    return { title: msg.title, body: msg.body };
}

export async function sendMessage(
    fetchFn: FetchFn,
    target: NotificationTarget,
    msg: Message,
    timeoutMs: number
): Promise<void> {
    await requestText(fetchFn, resolveWebhookUrl(target.url), {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payloadFor(target, msg)),
    }, timeoutMs);
}
