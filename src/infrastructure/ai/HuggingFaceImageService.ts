import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { promises as fs } from 'fs';
import path from 'path';
import { IImageService } from '../../domain/services/IImageService';
import { logger, errorMessage } from '../logging/Logger';

export const DEFAULT_IMAGE_MODEL_URL =
  'https://api-inference.huggingface.co/models/stabilityai/stable-diffusion-xl-base-1.0';

export const MAX_IMAGE_ATTEMPTS = 3;
export const MODEL_LOADING_WAIT_MS = 20_000;
export const NETWORK_RETRY_WAIT_MS = 10_000;
const REQUEST_TIMEOUT_MS = 60_000;

export interface HuggingFaceImageOptions {
  token?: string;
  outputDir: string;
  modelUrl?: string;
  http?: AxiosInstance;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Text-to-image through the HuggingFace inference API. Every failure mode
 * ends in a null path; image generation never fails an iteration.
 */
export class HuggingFaceImageService implements IImageService {
  private readonly http: AxiosInstance;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly modelUrl: string;

  constructor(private readonly options: HuggingFaceImageOptions) {
    this.http = options.http ?? axios.create({ timeout: REQUEST_TIMEOUT_MS });
    this.sleep = options.sleep ?? defaultSleep;
    this.modelUrl = options.modelUrl ?? DEFAULT_IMAGE_MODEL_URL;
  }

  get imageDir(): string {
    return path.join(this.options.outputDir, 'generated_images');
  }

  async generateImage(prompt: string, filename: string): Promise<string | null> {
    const { token } = this.options;
    if (!token) {
      logger.warn('HUGGINGFACE_TOKEN not set, skipping image generation');
      return null;
    }

    const enhancedPrompt =
      `${prompt}, professional marketing image, high quality, clean design, product photography style, 4k`;

    for (let attempt = 1; attempt <= MAX_IMAGE_ATTEMPTS; attempt++) {
      logger.info('Generating image', { attempt, maxAttempts: MAX_IMAGE_ATTEMPTS });

      let response: AxiosResponse<ArrayBuffer>;
      try {
        response = await this.http.post<ArrayBuffer>(
          this.modelUrl,
          { inputs: enhancedPrompt },
          {
            headers: { Authorization: `Bearer ${token}` },
            responseType: 'arraybuffer',
            validateStatus: () => true
          }
        );
      } catch (error) {
        logger.warn('Image generation request error', { attempt, error: errorMessage(error) });
        if (attempt < MAX_IMAGE_ATTEMPTS) {
          await this.sleep(NETWORK_RETRY_WAIT_MS);
        }
        continue;
      }

      if (response.status === 200) {
        return this.save(filename, response.data);
      }

      if (response.status === 503) {
        logger.info('Image model loading, waiting before retry', { waitMs: MODEL_LOADING_WAIT_MS });
        await this.sleep(MODEL_LOADING_WAIT_MS);
        continue;
      }

      logger.warn('Image generation failed', { attempt, status: response.status });
    }

    logger.warn('Image generation failed after all retries');
    return null;
  }

  /** A received image that cannot be written is dropped; it is not requested again. */
  private async save(filename: string, data: ArrayBuffer): Promise<string | null> {
    const outputPath = path.join(this.imageDir, filename);
    try {
      await fs.mkdir(this.imageDir, { recursive: true });
      await fs.writeFile(outputPath, Buffer.from(data));
    } catch (error) {
      logger.warn('Failed to save generated image', { outputPath, error: errorMessage(error) });
      return null;
    }
    logger.info('Image saved', { outputPath });
    return outputPath;
  }
}
