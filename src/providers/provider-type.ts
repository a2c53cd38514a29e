export enum ProviderType {
  Gemini = 'gemini',
  OpenAI = 'openai',
  Anthropic = 'anthropic',
}
