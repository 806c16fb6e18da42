export type MessagingPlatform = 'discord';

export interface PlatformRuntime {
  platform: MessagingPlatform;
  start(): Promise<void>;
  stop(): Promise<void>;
}
