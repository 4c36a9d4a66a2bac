// src/providers/gemini.ts
import { GoogleGenAI } from '@google/genai'
import type { Interpreter } from './base.js'

export interface GeminiOptions {
  apiKey: string
  model: string
  timeoutMs: number
}

export class GeminiInterpreter implements Interpreter {
  readonly name = 'gemini'
  private readonly client: GoogleGenAI

  constructor(private readonly opts: GeminiOptions) {
    this.client = new GoogleGenAI({
      apiKey: opts.apiKey,
      httpOptions: { timeout: opts.timeoutMs },
    })
  }

  async complete(prompt: string): Promise<string> {
    const response = await this.client.models.generateContent({
      model: this.opts.model,
      contents: prompt,
    })
    return response.text ?? ''
  }
}
