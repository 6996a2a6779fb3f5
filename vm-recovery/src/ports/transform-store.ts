export interface TransformDocumentStore {
  /** Writes the document where only the invoking user can read it; returns its path. */
  persist(name: string, content: string): Promise<string>;
  read(filePath: string): Promise<string>;
  /** Removes every document this store persisted. Files it only read stay. */
  dispose(): Promise<void>;
}
