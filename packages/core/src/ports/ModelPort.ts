export interface ModelCallOptions {
  signal?: AbortSignal;
}

export interface ModelReply {
  content: string;
}

/** Language-model backend. Rejects on network, auth and timeout failures. */
export interface ModelPort {
  invoke(prompt: string, opts?: ModelCallOptions): Promise<ModelReply>;
}
