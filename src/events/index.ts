export { EventBus } from "./bus.ts";
export type { EventHandler, Subscription } from "./bus.ts";
export { Topic, WILDCARD } from "./types.ts";
export type { Event, KnownTopic, LogTopic, PayloadOf, TopicPayloads } from "./types.ts";
