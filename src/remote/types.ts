/** Location of a job output on the remote side, e.g. a delivery URL. */
export type ArtifactReference = string;

export type SubmissionValue = string | number | boolean;
export type SubmissionPayload = Record<string, SubmissionValue>;

export interface RemoteCallOptions {
  signal?: AbortSignal;
}

/**
 * Remote compute service. Implementations report failures as
 * RemoteServiceError so callers can decide on retries by category.
 */
export interface RemoteJobClient {
  submit(modelId: string, input: SubmissionPayload, opts?: RemoteCallOptions): Promise<ArtifactReference[]>;
  fetch(reference: ArtifactReference, opts?: RemoteCallOptions): Promise<Buffer>;
}
