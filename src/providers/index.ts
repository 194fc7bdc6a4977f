export type { ILogProvider, LogEvent, LogLevel, RequestLogEvent } from './ILogProvider.js';
export { ConsoleLogProvider } from './ConsoleLogProvider.js';
export { AxiomLogProvider } from './AxiomLogProvider.js';
export { TaggedLogProvider, tagged } from './TaggedLogProvider.js';
export type { IEsiClient } from './IEsiClient.js';
export { EsiClient } from './EsiClient.js';
export type { IWebhookProvider, WebhookMessage, Embed, EmbedField } from './IWebhookProvider.js';
export { DiscordWebhookProvider } from './DiscordWebhookProvider.js';
export type { ITokenProvider } from './ITokenProvider.js';
export { SupabaseTokenProvider } from './SupabaseTokenProvider.js';
