// functions/src/core/media/storageUploader.ts

import * as path from "node:path";

import type { Bucket } from "@google-cloud/storage";

export interface GifUploader {
  /** Uploads the file under gifs/ and resolves to its public URL. */
  upload(localPath: string): Promise<string>;
}

/** Bucket comes from firebase-admin: getStorage().bucket(). */
export function createStorageGifUploader(bucket: Bucket): GifUploader {
  return {
    async upload(localPath) {
      const destination = `gifs/${path.basename(localPath)}`;
      const [file] = await bucket.upload(localPath, {
        destination,
        contentType: "image/gif",
      });
      await file.makePublic();
      return file.publicUrl();
    },
  };
}
