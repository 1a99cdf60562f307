import type { VideoInfo } from '../providers/types';

export const FALLBACK_TITLE = 'Downloaded Video';

export interface PostDefaults {
  defaultTitlePrefix: string;
  defaultDescription: string;
}

export interface PostText {
  title: string;
  description: string;
}

/**
 * Title: prefix (the caller's, else the configured default) directly followed by the
 * extracted title. Description: the caller's, else the video's own, else the default.
 */
export function composePost(
  videoInfo: Pick<VideoInfo, 'title' | 'description'>,
  overrides: { titlePrefix?: string | undefined; description?: string | undefined },
  defaults: PostDefaults
): PostText {
  const baseTitle = videoInfo.title.trim() || FALLBACK_TITLE;
  const prefix = overrides.titlePrefix ?? defaults.defaultTitlePrefix;
  const description = overrides.description?.trim() || videoInfo.description.trim() || defaults.defaultDescription;

  return {
    title: `${prefix}${baseTitle}`,
    description,
  };
}
