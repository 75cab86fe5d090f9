/**
 * Custom AI Error Types
 */

/**
 * Thrown by the gateway when no text provider initialised, so no model can
 * serve the request.
 */
export class NoModelAvailableError extends Error {
  public code = 'NO_MODEL_AVAILABLE';
  public requestedModel: string;

  constructor(requestedModel: string) {
    super(`No AI models available for request (requested: ${requestedModel})`);
    this.name = 'NoModelAvailableError';
    this.requestedModel = requestedModel;
  }
}

/**
 * Wraps a provider failure with the provider and model that raised it.
 */
export class ProviderRequestError extends Error {
  public code = 'PROVIDER_REQUEST_FAILED';
  public provider: string;
  public model: string;
  public status?: number;

  constructor(params: { provider: string; model: string; message: string; status?: number }) {
    super(params.message);
    this.name = 'ProviderRequestError';
    this.provider = params.provider;
    this.model = params.model;
    if (params.status !== undefined) this.status = params.status;
  }
}
