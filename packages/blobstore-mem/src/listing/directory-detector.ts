import { type DirectoryDetector, StorageType } from "@blobvault/blobstore";

const DIRECTORY_CONTENT_TYPES = new Set(["application/directory", "application/x-directory"]);

export const FOLDER_SUFFIX = "_$folder$";

function stripMarkerSuffix(name: string): string {
  if (name.endsWith(FOLDER_SUFFIX)) return name.slice(0, -FOLDER_SUFFIX.length);
  if (name.endsWith("/")) return name.slice(0, -1);
  return name;
}

/**
 * Recognizes the placeholder blobs tools create for empty folders:
 * a directory content type, a `_$folder$` suffix, or an empty blob whose
 * name ends with "/". The directory name drops that suffix.
 */
export const defaultDirectoryDetector: DirectoryDetector = {
  detect(metadata) {
    if (metadata.type === StorageType.RELATIVE_PATH) return metadata.name;
    if (metadata.type !== StorageType.BLOB) return undefined;

    if (metadata.contentType !== undefined && DIRECTORY_CONTENT_TYPES.has(metadata.contentType)) {
      return stripMarkerSuffix(metadata.name);
    }
    if (metadata.name.endsWith(FOLDER_SUFFIX)) {
      return stripMarkerSuffix(metadata.name);
    }
    if (metadata.name.endsWith("/") && metadata.size === 0) {
      return stripMarkerSuffix(metadata.name);
    }
    return undefined;
  },
};

/**
 * Detector that treats every blob as a regular blob
 */
export const noDirectoryDetector: DirectoryDetector = {
  detect: () => undefined,
};
