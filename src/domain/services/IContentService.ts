import { CampaignContext } from '../valueObjects/CampaignContext';
import { Decision } from '../valueObjects/Decision';
import { Platform, PostContent } from '../valueObjects/PostContent';

export interface ContentRequest {
  decision: Decision;
  context: CampaignContext;
  platform: Platform;
  generateImage: boolean;
}

export interface IContentService {
  /**
   * Turns the council's decision into a publish-ready post for the platform
   */
  generatePost(request: ContentRequest): Promise<PostContent>;
}
