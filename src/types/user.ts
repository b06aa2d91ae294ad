/**
 * User types.
 */

import { TeamId, UserId } from './common';

/**
 * User profile
 */
export interface UserProfile {
  real_name?: string;
  display_name?: string;
  email?: string;
  status_text?: string;
  status_emoji?: string;
  image_72?: string;
  bot_id?: string;
}

/**
 * Slack user
 */
export interface User {
  id: UserId;
  team_id?: TeamId;
  name?: string;
  real_name?: string;
  deleted?: boolean;
  tz?: string;
  profile?: UserProfile;
  is_admin?: boolean;
  is_bot?: boolean;
}

/**
 * Best display name for a user
 */
export function getDisplayName(user: User): string {
  return user.profile?.display_name || user.real_name || user.name || user.id;
}
