#!/usr/bin/env node
import 'reflect-metadata';
import dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { createContainer } from '../src/container';
import { validateAndLogEnvironment } from '../src/config/validateEnv';
import { RunCampaignIterationUseCase } from '../src/application/useCases/RunCampaignIterationUseCase';
import { ICouncilService } from '../src/domain/services/ICouncilService';
import { MongoDBConnection } from '../src/infrastructure/database/MongoDBConnection';
import { errorMessage } from '../src/infrastructure/logging/Logger';

dotenv.config();

interface CampaignOptions {
  iterations: number;
  brand: string;
  industry?: string;
  audience?: string;
  product?: string;
  apiTrends: boolean;
  image: boolean;
}

function positiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function runCampaign(options: CampaignOptions): Promise<void> {
  validateAndLogEnvironment();

  const container = await createContainer();
  const useCase = container.get<RunCampaignIterationUseCase>('RunCampaignIterationUseCase');
  const council = container.get<ICouncilService>('CouncilService');

  console.log(`🎯 Running ${options.iterations} iteration(s) for ${options.brand}`);

  try {
    for (let i = 0; i < options.iterations; i++) {
      const { iteration, durationMs } = await useCase.execute({
        brandName: options.brand,
        industry: options.industry,
        targetAudience: options.audience,
        productInfo: options.product,
        useApiTrends: options.apiTrends,
        generateImage: options.image
      });

      console.log('\n' + '='.repeat(60));
      console.log(`✅ Iteration ${iteration.number} (${durationMs}ms)`);
      console.log(`🏆 Winner: ${iteration.decision.winner} (confidence ${iteration.decision.confidence})`);
      console.log(`📱 Platform: ${iteration.content.platform}`);
      console.log(`📝 Caption: ${iteration.content.caption}`);
      console.log(`📈 Overall score: ${iteration.engagement.overallScore.toFixed(1)}/10`);
    }

    console.log('\n' + '='.repeat(60));
    console.log('🧠 Final voting weights');
    for (const stats of council.getAgentStats()) {
      console.log(`   ${stats.agentId}: ${stats.currentWeight.toFixed(2)}`);
    }
  } finally {
    if (process.env.USE_MONGODB === 'true') {
      await container.get<MongoDBConnection>('MongoDBConnection').disconnect();
    }
  }
}

const program = new Command()
  .name('run-campaign')
  .description('Run marketing council iterations from the command line')
  .option('-n, --iterations <count>', 'number of iterations to run', positiveInt, 1)
  .requiredOption('-b, --brand <name>', 'brand name')
  .option('--industry <industry>', 'industry')
  .option('--audience <audience>', 'target audience')
  .option('--product <info>', 'product or campaign description')
  .option('--no-api-trends', 'use sample trends instead of live sources')
  .option('--image', 'generate an image for each post', false)
  .action(async (options: CampaignOptions) => {
    await runCampaign(options);
  });

program.parseAsync(process.argv).catch(error => {
  console.error('❌ Campaign failed:', errorMessage(error));
  process.exit(1);
});
