export type DocumentMetadata = {
  id: string;
  name: string;
  path: string;
};

/** Uploaded documents by id. Metadata lives in memory only. */
export class DocumentStore {
  private readonly documentsById = new Map<string, DocumentMetadata>();

  save(meta: DocumentMetadata): void {
    this.documentsById.set(meta.id, meta);
  }

  get(id: string): DocumentMetadata | undefined {
    return this.documentsById.get(id);
  }

  getPathById(id: string): string | undefined {
    return this.documentsById.get(id)?.path;
  }
}
