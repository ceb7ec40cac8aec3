import { IContentService, ContentRequest } from '../../domain/services/IContentService';
import { IImageService } from '../../domain/services/IImageService';
import { ITextGenerationService } from '../../domain/services/ITextGenerationService';
import { CampaignContext } from '../../domain/valueObjects/CampaignContext';
import { Platform, PostContent } from '../../domain/valueObjects/PostContent';
import { AppError } from '../../domain/errors/AppError';
import { logger, errorMessage } from '../logging/Logger';

export interface PlatformSpec {
  charLimit: number;
  style: string;
  hashtagCount: number;
  postingTime: string;
}

export const PLATFORM_SPECS: Record<Platform, PlatformSpec> = {
  twitter: {
    charLimit: 280,
    style: 'Punchy, concise, engaging. Use 1-2 relevant hashtags. Make it quotable.',
    hashtagCount: 2,
    postingTime: '9:00 AM EST'
  },
  instagram: {
    charLimit: 2200,
    style: 'Visual storytelling, conversational, emoji-friendly. Use 5-10 hashtags.',
    hashtagCount: 8,
    postingTime: '11:00 AM EST'
  },
  linkedin: {
    charLimit: 3000,
    style: 'Professional, value-driven, thought leadership. Use 3-5 hashtags.',
    hashtagCount: 4,
    postingTime: '8:00 AM EST'
  }
};

const COPYWRITER_PROMPT =
  'You are an expert social media copywriter. Write compelling, platform-optimized posts.';

export function extractHashtags(text: string): string[] {
  return text.split(/\s+/).filter(word => word.startsWith('#'));
}

export function buildImagePrompt(context: CampaignContext): string {
  return `${context.brandName} ${context.productInfo}, modern professional design, marketing photography`;
}

export class ContentGenerator implements IContentService {
  constructor(
    private readonly textService: ITextGenerationService,
    private readonly imageService: IImageService,
    private readonly now: () => Date = () => new Date()
  ) {}

  async generatePost(request: ContentRequest): Promise<PostContent> {
    const { decision, context, platform, generateImage } = request;
    const spec = PLATFORM_SPECS[platform] ?? PLATFORM_SPECS.twitter;
    const label = platform.toUpperCase();

    const prompt = `Generate a ${label} post based on this marketing decision:

BRAND: ${context.brandName}
PRODUCT: ${context.productInfo}
TARGET AUDIENCE: ${context.targetAudience}

DECISION FROM COUNCIL:
${decision.decision}

IMPLEMENTATION STRATEGY:
${decision.implementation}

PLATFORM: ${label}
CHARACTER LIMIT: ${spec.charLimit}
STYLE GUIDE: ${spec.style}

Generate a complete post that:
1. Captures attention immediately
2. Communicates the key value proposition
3. Includes ${spec.hashtagCount} relevant hashtags
4. Stays under ${spec.charLimit} characters
5. Includes a clear call-to-action

Provide ONLY the post text, ready to publish. No explanations or meta-commentary.
`;

    let caption: string;
    try {
      caption = (
        await this.textService.complete({
          systemPrompt: COPYWRITER_PROMPT,
          userPrompt: prompt,
          temperature: 0.8,
          maxTokens: 500
        })
      ).trim();
    } catch (error) {
      logger.error('Post generation failed', { platform, error: errorMessage(error) });
      throw AppError.contentGenerationError(platform, error);
    }

    let imagePath: string | null = null;
    if (generateImage) {
      const timestamp = Math.floor(this.now().getTime() / 1000);
      imagePath = await this.imageService.generateImage(
        buildImagePrompt(context),
        `${platform}_post_${timestamp}.png`
      );
    }

    return {
      platform,
      caption,
      hashtags: extractHashtags(caption),
      postingTime: spec.postingTime,
      charCount: caption.length,
      imagePath
    };
  }
}
