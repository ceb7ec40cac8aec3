import 'reflect-metadata';
import path from 'path';
import { Container } from 'inversify';
import { ICouncilService } from './domain/services/ICouncilService';
import { IContentService } from './domain/services/IContentService';
import { IImageService } from './domain/services/IImageService';
import { IRandomSource } from './domain/services/IRandomSource';
import { ITextGenerationService } from './domain/services/ITextGenerationService';
import { ITrendService } from './domain/services/ITrendService';
import { IIterationRepository } from './domain/repositories/IIterationRepository';
import { EngagementConfig, loadEngagementConfig } from './config/engagementConfig';
import { loadCouncilMembers } from './config/AgentConfigLoader';
import { createTextGenerationService } from './infrastructure/ai/createTextGenerationService';
import { HuggingFaceImageService } from './infrastructure/ai/HuggingFaceImageService';
import { ContentGenerator } from './infrastructure/content/ContentGenerator';
import { CouncilMembers } from './infrastructure/council/agents/CouncilMembers';
import { CouncilOrchestrator } from './infrastructure/council/CouncilOrchestrator';
import { EngagementSimulator } from './infrastructure/council/engagement/EngagementSimulator';
import { CouncilEventEmitter } from './infrastructure/council/events/CouncilEventEmitter';
import { MongoDBConnection } from './infrastructure/database/MongoDBConnection';
import { MathRandomSource } from './infrastructure/random/MathRandomSource';
import { SeededRandomSource } from './infrastructure/random/SeededRandomSource';
import { FileIterationRepository } from './infrastructure/repositories/FileIterationRepository';
import { InMemoryIterationRepository } from './infrastructure/repositories/InMemoryIterationRepository';
import { MongoIterationRepository } from './infrastructure/repositories/MongoIterationRepository';
import { RedditTrendSource } from './infrastructure/trends/RedditTrendSource';
import { SampleTrendSource } from './infrastructure/trends/SampleTrendSource';
import { TrendFetcher } from './infrastructure/trends/TrendFetcher';
import { RunCampaignIterationUseCase } from './application/useCases/RunCampaignIterationUseCase';
import { CouncilController } from './interfaces/controllers/CouncilController';

/**
 * Replacements for collaborators that would otherwise reach the network,
 * the disk or a provider API
 */
export interface ContainerOverrides {
  textService?: ITextGenerationService;
  trendService?: ITrendService;
  imageService?: IImageService;
  contentService?: IContentService;
  iterationRepository?: IIterationRepository;
  randomSource?: IRandomSource;
  engagementConfig?: EngagementConfig;
  members?: CouncilMembers;
}

function resolvePath(value: string | undefined, fallback: string): string {
  return path.resolve(process.cwd(), value || fallback);
}

function createRandomSource(env: NodeJS.ProcessEnv): IRandomSource {
  if (env.ENGAGEMENT_SEED) {
    return new SeededRandomSource(parseInt(env.ENGAGEMENT_SEED, 10));
  }
  return new MathRandomSource();
}

export async function createContainer(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ContainerOverrides = {}
): Promise<Container> {
  const container = new Container();
  const outputDir = resolvePath(env.OUTPUT_DIR, 'outputs');

  const textService = overrides.textService ?? createTextGenerationService(env);
  const randomSource = overrides.randomSource ?? createRandomSource(env);
  const members =
    overrides.members ??
    (await loadCouncilMembers(resolvePath(env.AGENTS_CONFIG_PATH, 'config/agents.json'), textService));

  container.bind<ITextGenerationService>('TextGenerationService').toConstantValue(textService);
  container.bind<IRandomSource>('RandomSource').toConstantValue(randomSource);
  container.bind<CouncilMembers>('CouncilMembers').toConstantValue(members);
  container
    .bind<EngagementConfig>('EngagementConfig')
    .toConstantValue(overrides.engagementConfig ?? loadEngagementConfig(env));

  // Collaborators
  container.bind<ITrendService>('TrendService').toConstantValue(
    overrides.trendService ??
      new TrendFetcher(
        [
          new RedditTrendSource({
            subreddits: env.TREND_SUBREDDITS
              ? env.TREND_SUBREDDITS.split(',').map(s => s.trim()).filter(Boolean)
              : undefined,
            userAgent: env.REDDIT_USER_AGENT
          })
        ],
        new SampleTrendSource(resolvePath(env.SAMPLE_TRENDS_PATH, 'data/sample_trends.json'), randomSource)
      )
  );
  container
    .bind<IImageService>('ImageService')
    .toConstantValue(
      overrides.imageService ?? new HuggingFaceImageService({ token: env.HUGGINGFACE_TOKEN, outputDir })
    );
  container.bind<IContentService>('ContentService').toDynamicValue(context =>
    overrides.contentService ??
      new ContentGenerator(
        context.container.get<ITextGenerationService>('TextGenerationService'),
        context.container.get<IImageService>('ImageService')
      )
  ).inSingletonScope();

  // Persistence - MongoDB when enabled, JSON files by default, memory for tests
  container.bind<MongoDBConnection>('MongoDBConnection').to(MongoDBConnection).inSingletonScope();
  if (overrides.iterationRepository) {
    container.bind<IIterationRepository>('IterationRepository').toConstantValue(overrides.iterationRepository);
  } else if (env.USE_MONGODB === 'true') {
    await container.get<MongoDBConnection>('MongoDBConnection').connect();
    container.bind<IIterationRepository>('IterationRepository').to(MongoIterationRepository).inSingletonScope();
  } else if (env.ITERATION_STORE === 'memory') {
    container.bind<IIterationRepository>('IterationRepository').to(InMemoryIterationRepository).inSingletonScope();
  } else {
    container.bind<IIterationRepository>('IterationRepository').toConstantValue(new FileIterationRepository(outputDir));
  }

  // Council
  container.bind<CouncilEventEmitter>('CouncilEventEmitter').to(CouncilEventEmitter).inSingletonScope();
  container.bind<EngagementSimulator>('EngagementSimulator').to(EngagementSimulator).inSingletonScope();
  container.bind<ICouncilService>('CouncilService').to(CouncilOrchestrator).inSingletonScope();

  // Use cases and controllers
  container
    .bind<RunCampaignIterationUseCase>('RunCampaignIterationUseCase')
    .to(RunCampaignIterationUseCase)
    .inSingletonScope();
  container.bind<CouncilController>('CouncilController').to(CouncilController).inSingletonScope();

  return container;
}
