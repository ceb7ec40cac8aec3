export interface IImageService {
  /**
   * Renders an image for the prompt and returns where it was stored,
   * or null when no image could be produced.
   */
  generateImage(prompt: string, filename: string): Promise<string | null>;
}
