export { NotificationDispatcher } from './dispatcher';
export type { DispatcherOptions } from './dispatcher';
export { formatEvent, humanizeDuration, discordTs, chunkLines, machineSectionLines, HR, DISCORD_CHUNK_LIMIT } from './formatters';
export type { FormatOptions } from './formatters';
export { resolveWebhookUrl, payloadFor, sendMessage } from './transport';
export { EVENT_TYPES, eventTypeOf, normalizeEvents, inferService, buildTargets, acceptsEvent } from './types';
export type {
    NotificationEventType,
    NotificationEvent,
    StartupItem,
    EventSink,
    DrainReport,
    Message,
    ServiceName,
    NotificationTarget,
} from './types';
