import { Platform } from '../../domain/valueObjects/PostContent';

export const DEFAULT_PLATFORM: Platform = 'twitter';

// Checked in order; the first platform with a matching keyword wins.
const PLATFORM_KEYWORDS: ReadonlyArray<readonly [Platform, readonly string[]]> = [
  ['twitter', ['twitter', 'x.com']],
  ['instagram', ['instagram', 'ig']],
  ['linkedin', ['linkedin']]
];

export function resolvePlatform(implementationText: string): Platform {
  const text = implementationText.toLowerCase();

  for (const [platform, keywords] of PLATFORM_KEYWORDS) {
    if (keywords.some(keyword => text.includes(keyword))) {
      return platform;
    }
  }

  return DEFAULT_PLATFORM;
}
