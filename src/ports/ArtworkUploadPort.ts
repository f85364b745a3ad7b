export interface ArtworkUploadRequest {
  bytes: Uint8Array;
  fileName?: string;
  mimeType?: string;
}

/**
 * Anonymous image hosting: upload bytes, get a public URL. Rejects with
 * `UploadError` once its own retry budget is spent.
 */
export interface ArtworkUploadPort {
  upload(request: ArtworkUploadRequest): Promise<string>;
}
