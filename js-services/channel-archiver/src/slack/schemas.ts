import { z } from 'zod';

/**
 * Zod schemas for the parts of Slack Web API responses the archiver reads.
 * Rows that fail validation are dropped by the client; optional fields become null.
 */

const ResponseMetadataSchema = z
  .object({
    next_cursor: z.string().optional(),
  })
  .optional();

export const ChannelRowSchema = z.object({
  id: z.string().min(1),
  name: z.string().optional(),
  created: z.number().optional(),
  is_archived: z.boolean().optional(),
  is_private: z.boolean().optional(),
});

export const ConversationsListPageSchema = z.object({
  channels: z.array(z.unknown()),
  response_metadata: ResponseMetadataSchema,
});

export const ConversationsMembersPageSchema = z.object({
  members: z.array(z.string()),
  response_metadata: ResponseMetadataSchema,
});

export const MessageRowSchema = z.object({
  ts: z.string().regex(/^\d+(\.\d+)?$/),
  subtype: z.string().optional(),
});

export const ConversationsHistoryPageSchema = z.object({
  messages: z.array(z.unknown()),
});

export const UserInfoSchema = z.object({
  user: z.object({
    id: z.string().min(1),
    deleted: z.boolean().optional(),
    is_bot: z.boolean().optional(),
    profile: z
      .object({
        email: z.string().optional(),
      })
      .optional(),
  }),
});
