import { TextGenerator } from './text-generator.js';

const WORDS = ['chrome', 'follicle', 'razor', 'shine', 'norwood', 'hairline'];

/**
 * Stand-in generator for DEMO_MODE: waits briefly, then returns a few
 * sentences of filler so the reply lifecycle can be watched without an API key.
 */
export class MockTextGenerator implements TextGenerator {
  constructor(
    private readonly random: () => number = Math.random,
    private readonly delayMs: number = 800
  ) {}

  async generate(_systemPrompt: string, userMessage: string): Promise<string> {
    await this.sleep(this.delayMs + this.random() * this.delayMs);
    const sentences = [this.sentence(), this.sentence(), this.sentence()];
    return `(demo) Re: ${userMessage.slice(0, 40)}\n\n${sentences.join(' ')}`;
  }

  private sentence(): string {
    const word = WORDS[Math.floor(this.random() * WORDS.length)] ?? WORDS[0];
    const count = 3 + Math.floor(this.random() * 5);
    const text = Array(count).fill(word).join(' ');
    return text.charAt(0).toUpperCase() + text.slice(1) + '.';
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}
