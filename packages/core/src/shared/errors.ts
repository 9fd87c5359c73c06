export class ConclaveError extends Error {
  constructor(message: string, public readonly code?: string) {
    super(message);
    this.name = 'ConclaveError';
  }
}

export class ConfigError extends ConclaveError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class PipelineError extends ConclaveError {
  constructor(message: string, code = 'PIPELINE_ERROR') {
    super(message, code);
    this.name = 'PipelineError';
  }
}

/** Stage one produced no usable answer. The only fatal model-side condition. */
export class AllModelsFailedError extends PipelineError {
  constructor(public readonly failures: Readonly<Record<string, string>>) {
    const detail = Object.entries(failures)
      .map(([model, kind]) => `${model} (${kind})`)
      .join(', ');
    super(`All council models failed in stage 1: ${detail || 'no models configured'}`, 'ALL_MODELS_FAILED');
    this.name = 'AllModelsFailedError';
  }
}

export class PipelineCancelledError extends PipelineError {
  constructor(public readonly stage: 1 | 2 | 3) {
    super(`Run cancelled during stage ${stage}`, 'PIPELINE_CANCELLED');
    this.name = 'PipelineCancelledError';
  }
}

export class GatewayError extends ConclaveError {
  constructor(message: string, public readonly status?: number) {
    super(message, 'GATEWAY_ERROR');
    this.name = 'GatewayError';
  }
}
