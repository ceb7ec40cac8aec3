export type Platform = 'twitter' | 'instagram' | 'linkedin';

export const PLATFORMS: readonly Platform[] = ['twitter', 'instagram', 'linkedin'];

export interface PostContent {
  platform: Platform;
  caption: string;
  hashtags: string[];
  postingTime: string;
  charCount: number;
  imagePath: string | null;
}
