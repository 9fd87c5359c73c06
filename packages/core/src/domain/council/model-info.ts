/** One entry of the gateway's model catalogue, as `fetchModels` returns it. */
export interface OpenRouterModelInfo {
  id: string;
  name: string;
  description?: string;
  context_length: number;
  /** USD per million tokens. */
  pricing: {
    prompt: number;
    completion: number;
  };
}
