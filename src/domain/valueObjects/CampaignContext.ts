/**
 * User-supplied part of a campaign, before trends are attached.
 */
export interface CampaignBrief {
  brandName?: string;
  industry?: string;
  targetAudience?: string;
  productInfo?: string;
}

export interface CampaignContext {
  readonly brandName: string;
  readonly industry: string;
  readonly targetAudience: string;
  readonly productInfo: string;
  readonly trends: readonly string[];
}

export function createCampaignContext(brief: CampaignBrief, trends: readonly string[]): CampaignContext {
  return Object.freeze({
    brandName: brief.brandName || 'Unknown',
    industry: brief.industry || 'Tech',
    targetAudience: brief.targetAudience || 'General',
    productInfo: brief.productInfo || 'No product info provided',
    trends: Object.freeze([...trends])
  });
}
