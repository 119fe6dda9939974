import type { WireEventAttributes } from '@stackwire/observability-contracts';
import { Event, EventSerializationOptions } from './event';
import { User } from './user';

/** Logger name used when neither the environment nor the event names one */
export const DEFAULT_LOGGER_NAME = 'StackwireClient';

/**
 * Fold overlays onto `base`, left to right. A key in a later overlay
 * replaces the earlier value whole; nested objects are never merged.
 */
export function mergeAttributes<T extends object>(
  base: T,
  ...overlays: Array<Partial<T> | undefined>
): T {
  const merged: T = { ...base };
  for (const overlay of overlays) {
    if (overlay !== undefined) {
      Object.assign(merged, overlay);
    }
  }
  return merged;
}

export interface EventAttributeSources extends EventSerializationOptions {
  event: Event;
  /** Slow-changing defaults supplied once per client */
  environmentAttributes?: Event;
  /** The client's ambient user */
  userContext?: User;
}

/**
 * Attributes of one event with the client's defaults mixed in, lowest
 * precedence first:
 *
 * 1. protocol fields (`platform`, `sdk`) and the `logger` default
 * 2. environment attributes
 * 3. ambient user, under `user`
 * 4. the event itself
 *
 * An event that names its own user replaces the ambient `user` object
 * entirely; the two are never combined field by field.
 */
export function buildEventAttributes(sources: EventAttributeSources): WireEventAttributes {
  const { event, environmentAttributes, userContext, ...serialization } = sources;
  const eventAttributes = event.toJson(serialization);

  return mergeAttributes<WireEventAttributes>(
    {
      platform: eventAttributes.platform,
      sdk: eventAttributes.sdk,
      logger: DEFAULT_LOGGER_NAME,
    },
    environmentAttributes?.toJson(),
    userContext ? { user: userContext.toJson() } : undefined,
    eventAttributes,
  );
}
