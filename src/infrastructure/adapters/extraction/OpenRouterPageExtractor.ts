import OpenAI from 'openai';
import { type ExtractedPageDTO, ExtractedPageSchema } from '../../../application/dto/ExtractedPageDTO.js';
import type { RenderedPageDTO } from '../../../application/dto/UploadedFileDTO.js';
import type { PageExtractorPort } from '../../../application/ports/PageExtractorPort.js';

export interface OpenRouterPageExtractorConfig {
  apiKey?: string;
  model: string;
  timeoutMs: number;
  baseUrl?: string;
}

const PROMPT = `You read one page of a credit card statement. Return ONLY a JSON object, no explanation.

Format:
{
  "transactions": [
    {"trans_date": "YYYY-MM-DD", "posting_date": "YYYY-MM-DD", "description": "text", "amount": 123.45, "is_payment": false}
  ],
  "cutoff_day": 20,
  "bank_name": "issuer name or null",
  "card_name": "card product name or null"
}

Rules:
- amount is positive for purchases and fees, negative for refunds and cashback
- is_payment is true for payments made to the card account
- cutoff_day is the day of month the billing cycle closes, or null if the page does not say
- convert dates to YYYY-MM-DD
- skip sample or illustration pages: return {"transactions": [], "cutoff_day": null, "bank_name": null, "card_name": null}`;

export class OpenRouterPageExtractor implements PageExtractorPort {
  private readonly client: OpenAI | null;

  constructor(private readonly config: OpenRouterPageExtractorConfig) {
    this.client = config.apiKey
      ? new OpenAI({
          baseURL: config.baseUrl ?? 'https://openrouter.ai/api/v1',
          apiKey: config.apiKey,
          timeout: config.timeoutMs,
          maxRetries: 0, // a failed page is reported, not retried
        })
      : null;
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  async extract(page: RenderedPageDTO): Promise<ExtractedPageDTO> {
    if (!this.client) {
      throw new Error('Page extraction is not configured. Set OPENROUTER_API_KEY to enable it.');
    }

    const response = await this.client.chat.completions.create({
      model: this.config.model,
      temperature: 0,
      messages: [
        {
          role: 'user',
          content:
            page.kind === 'text'
              ? `${PROMPT}\n\nPage ${page.index + 1}:\n${page.text}`
              : [
                  { type: 'text', text: PROMPT },
                  {
                    type: 'image_url',
                    image_url: { url: `data:${page.mimeType};base64,${page.data.toString('base64')}` },
                  },
                ],
        },
      ],
    });

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error(`No response from the model for page ${page.index + 1}`);
    }

    // The model sometimes wraps the object in prose or a code fence.
    const jsonMatch = content.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new Error(`No JSON object in the model response for page ${page.index + 1}`);
    }

    const payload: unknown = JSON.parse(jsonMatch[0]);
    return ExtractedPageSchema.parse(payload);
  }
}
