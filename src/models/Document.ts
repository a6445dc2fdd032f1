import { Schema, model, models, Model } from "mongoose";
import type { DocStatus } from "@/lib/documents";

export interface IDocument {
  fileId: string; // id público (file_yyyymmdd_hhmmss_xxxxxxxx)
  filename: string;
  fileType: string;
  fileSize: number; // bytes do upload
  charLength: number; // tamanho do texto normalizado
  chunksCount: number;
  vectorsCount: number;
  status: DocStatus;
  error?: string;
  uploadedAt: Date;
}

const DocumentSchema = new Schema<IDocument>(
  {
    fileId: { type: String, required: true, unique: true, maxlength: 255 },
    filename: { type: String, required: true },
    fileType: { type: String, required: true },
    fileSize: { type: Number, required: true },
    charLength: { type: Number, required: true },
    chunksCount: { type: Number, default: 0 },
    vectorsCount: { type: Number, default: 0 },
    status: {
      type: String,
      enum: ["processing", "ready", "failed"],
      default: "processing",
    },
    error: String,
  },
  { timestamps: { createdAt: "uploadedAt", updatedAt: false } }
);

DocumentSchema.index({ uploadedAt: -1 });

export const DocumentModel: Model<IDocument> =
  models.Document ||
  model<IDocument>("Document", DocumentSchema);
