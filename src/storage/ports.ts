export interface BlobUploader {
  /** Resolves false when the upload failed; never rejects. */
  upload(content: string, folderPath: string, filename: string): Promise<boolean>;
}
