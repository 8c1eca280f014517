/**
 * Topic permissions carried by data-access and protocol tokens, and requested
 * when issuing them.
 *
 * @packageDocumentation
 */

import { z } from 'zod';

/**
 * What a client may do with a topic.
 */
export type TopicAction = 'publish' | 'subscribe';

/**
 * The stream resource a permission applies to.
 */
export interface TopicResource {
  /** Resource type, always "topic" for data streams */
  readonly type: string;
  /** Data stream name, e.g. "weather" */
  readonly stream: string;
  /** Topic prefix, e.g. "/tt" */
  readonly prefix: string;
  /** Topic pattern, e.g. "+/+/+/something/#" */
  readonly topic: string;
}

/**
 * A single permission claim.
 */
export interface TopicPermission {
  readonly action: TopicAction;
  readonly resource: TopicResource;
}

/** Accepts "publish" and "Publish" alike. */
export const topicActionSchema = z
  .string()
  .toLowerCase()
  .pipe(z.enum(['publish', 'subscribe']));

export const topicPermissionSchema: z.ZodType<TopicPermission, z.ZodTypeDef, unknown> = z.object({
  action: topicActionSchema,
  resource: z.object({
    type: z.string().default('topic'),
    stream: z.string(),
    prefix: z.string(),
    topic: z.string(),
  }),
});

/**
 * Creates a topic permission.
 *
 * @example
 * ```typescript
 * const permission = createTopicPermission('subscribe', 'weather', '/tt', '+/+/+/forecast/#');
 * ```
 */
export const createTopicPermission = (
  action: TopicAction,
  stream: string,
  prefix: string,
  topic: string
): TopicPermission => ({
  action,
  resource: { type: 'topic', stream, prefix, topic },
});

/**
 * Returns `<prefix>/<stream>/<topic>` for a permission.
 */
export const fullyQualifiedTopicName = (permission: TopicPermission): string =>
  `${permission.resource.prefix}/${permission.resource.stream}/${permission.resource.topic}`;
