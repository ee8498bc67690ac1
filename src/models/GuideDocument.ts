import { Document, Schema, model } from 'mongoose';
import type { ChunkScope } from '../services/guide/types';

export interface GuideDocumentDocument extends Document {
  name: string;
  scope: ChunkScope;
  groupId?: string;
  rawText: string;
  rawTextLength: number;
  createdAt: Date;
  updatedAt: Date;
}

const guideDocumentSchema = new Schema<GuideDocumentDocument>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
    },
    scope: {
      type: String,
      enum: ['global', 'group'],
      required: true,
      default: 'global',
    },
    groupId: {
      type: String,
      trim: true,
    },
    rawText: {
      type: String,
      required: true,
    },
    rawTextLength: {
      type: Number,
      required: true,
      min: 0,
    },
  },
  {
    timestamps: true,
  }
);

guideDocumentSchema.index({ scope: 1, groupId: 1, createdAt: -1 });

export const GuideDocument = model<GuideDocumentDocument>('GuideDocument', guideDocumentSchema);
