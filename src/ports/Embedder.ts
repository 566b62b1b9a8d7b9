export interface Embedder {
  readonly modelName: string;
  getEmbeddings: (text: string) => Promise<number[]>;
  close: () => Promise<void>;
}
