import { Schema, model, models, Model } from "mongoose";

export interface IChunk {
  chunkId: string; // <fileId>#<sequenceIndex>
  fileId: string; // ref lógica para Document (só filtro, não ciclo de vida)
  sequenceIndex: number;
  text: string;
  charStart: number;
  charEnd: number;
  embedding: number[];
  createdAt: Date;
}

const ChunkSchema = new Schema<IChunk>(
  {
    chunkId: { type: String, required: true, unique: true },
    fileId: { type: String, required: true, maxlength: 255 },
    sequenceIndex: { type: Number, required: true },
    text: { type: String, required: true, maxlength: 10000 },
    charStart: { type: Number, required: true },
    charEnd: { type: Number, required: true },
    // sem índice vetorial local; com Atlas, o índice de busca vetorial
    // é criado fora da aplicação sobre este campo
    embedding: { type: [Number], required: true },
  },
  { timestamps: { createdAt: true, updatedAt: false } }
);

// partição por documento + ordem estável dentro dele
ChunkSchema.index({ fileId: 1, sequenceIndex: 1 });

export const ChunkModel: Model<IChunk> =
  models.Chunk ||
  model<IChunk>("Chunk", ChunkSchema);
