import type { Result } from "@plainboard/core";

/**
 * Transfer state the cloud-storage host reports for one file.
 */
export interface CloudItemState {
  isUploaded: boolean;
  isUploading: boolean;
  isDownloaded: boolean;
  isDownloading: boolean;
}

/**
 * Port to the host that owns a cloud-synchronized folder.
 */
export interface CloudItemInspector {
  /** Root of the synchronized container, or null when there is none. */
  containerRoot(): string | null;

  inspect(filePath: string): Promise<Result<CloudItemState, string>>;

  /** Ask the host to fetch a file that is only known by placeholder. */
  startDownload(filePath: string): Promise<Result<void, string>>;
}
