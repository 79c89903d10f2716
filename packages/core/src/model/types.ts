export interface FileReference {
  uri: string;
  mimeType: string;
}

export interface GenerationRequest {
  prompt: string;
  file?: FileReference;
}

/** A text-producing model endpoint, already bound to its fallback list. */
export interface GenerativeModel {
  readonly label: string;
  generate(request: GenerationRequest): Promise<string>;
}

export type AssetState = "STATE_UNSPECIFIED" | "PROCESSING" | "ACTIVE" | "FAILED";

export interface UploadedAsset {
  name: string;
  uri: string;
  mimeType: string;
  state: AssetState;
}

/** Where audio goes before the model can reference it. */
export interface AssetStore {
  upload(filePath: string, mimeType: string): Promise<UploadedAsset>;
  waitUntilActive(asset: UploadedAsset): Promise<UploadedAsset>;
  remove(asset: UploadedAsset): Promise<void>;
}
