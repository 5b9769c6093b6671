import { GoogleGenerativeAI, type Part } from '@google/generative-ai'
import { GEMINI_API_KEY, GEMINI_MODEL } from '../config'

export interface CaptionOracle {
  captionImage(image: Buffer, prompt: string, mimeType?: string): Promise<string>
  summarize(captions: string[]): Promise<string>
}

export const CAPTION_PROMPT =
  'Provide a very brief, precise caption of the main content in this image (max 2 sentences). Focus on key objects, actions, and context.'

export class GeminiCaptionOracle implements CaptionOracle {
  private client: GoogleGenerativeAI | null = null

  constructor(
    private readonly apiKey: string = GEMINI_API_KEY,
    private readonly model: string = GEMINI_MODEL
  ) {}

  // The client is built on first use so a server without a key can still start.
  private getClient(): GoogleGenerativeAI {
    if (this.client) return this.client
    const key = this.apiKey.trim()
    if (!key) throw new Error('missing_gemini_api_key')
    this.client = new GoogleGenerativeAI(key)
    return this.client
  }

  private async generate(parts: Array<string | Part>): Promise<string> {
    const model = this.getClient().getGenerativeModel({ model: this.model })
    const result = await model.generateContent(parts)
    const text = result.response.text().trim()
    if (!text) throw new Error('gemini_empty_response')
    return text
  }

  async captionImage(image: Buffer, prompt: string, mimeType = 'image/jpeg'): Promise<string> {
    return this.generate([prompt, { inlineData: { data: image.toString('base64'), mimeType } }])
  }

  async summarize(captions: string[]): Promise<string> {
    const prompt =
      'Write a concise summary of the video using only these image captions. No meta-commentary. Just the summary:\n- ' +
      captions.join('\n- ')
    return this.generate([prompt])
  }
}
