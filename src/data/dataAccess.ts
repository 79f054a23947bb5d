/**
 * Data Access Facade
 *
 * Narrow contract the orchestrator uses to reach a user's stored package:
 * metadata lookup, retrieval with server-side decryption, and text
 * extraction.
 */

export interface PackageMetadata {
  packageID: string;
  userID: string;
  rawDataReference: string;
  /** MIME type recorded at upload */
  dataType: string;
  sourceDescription: string | null;
  consentTokenID: string | null;
  originalFilename: string | null;
  sizeBytes: number | null;
}

export interface DataAccessFacade {
  /**
   * Resolves to null when no package exists. Rejects when the metadata store
   * itself cannot be reached.
   */
  fetchPackageMetadata(packageID: string): Promise<PackageMetadata | null>;

  /** Resolves to null when the object is missing or unreadable. */
  retrieveAndDecrypt(metadata: PackageMetadata): Promise<Uint8Array | null>;

  /** Resolves to null when the type is unsupported or no text was found. */
  extractText(
    bytes: Uint8Array,
    dataType: string,
    filename?: string | null
  ): Promise<string | null>;
}
