/**
 * Conversation types.
 */

import { ChannelId, UserId } from './common';

export type ConversationType = 'public_channel' | 'private_channel' | 'mpim' | 'im';

/**
 * Slack conversation (channel, private channel, DM or group DM)
 */
export interface Channel {
  id: ChannelId;
  name?: string;
  is_channel?: boolean;
  is_group?: boolean;
  is_im?: boolean;
  is_mpim?: boolean;
  is_private?: boolean;
  is_archived?: boolean;
  is_member?: boolean;
  created?: number;
  creator?: UserId;
  /** Other member of a DM */
  user?: UserId;
  topic?: { value: string; creator: UserId; last_set: number };
  purpose?: { value: string; creator: UserId; last_set: number };
  num_members?: number;
}
