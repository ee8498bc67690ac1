import { Document, Schema, Types, model } from 'mongoose';
import type { ChunkEntities, ChunkScope } from '../services/guide/types';

export interface GuideChunkDocument extends Document {
  docId: Types.ObjectId;
  scope: ChunkScope;
  groupId?: string;
  chunkIndex: number;
  content: string;
  tags: string[];
  entities: ChunkEntities;
  createdAt: Date;
  updatedAt: Date;
}

const entitiesSchema = new Schema<ChunkEntities>(
  {
    statuses: { type: [String], default: [] },
    modes: { type: [String], default: [] },
    identities: { type: [String], default: [] },
    egos: { type: [String], default: [] },
    sinners: { type: [String], default: [] },
  },
  { _id: false }
);

const guideChunkSchema = new Schema<GuideChunkDocument>(
  {
    docId: {
      type: Schema.Types.ObjectId,
      ref: 'GuideDocument',
      required: true,
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
    chunkIndex: {
      type: Number,
      required: true,
      min: 0,
    },
    content: {
      type: String,
      required: true,
    },
    tags: {
      type: [String],
      default: [],
    },
    entities: {
      type: entitiesSchema,
      default: () => ({}),
    },
  },
  {
    timestamps: true,
  }
);

guideChunkSchema.index({ docId: 1, chunkIndex: 1 }, { unique: true });
guideChunkSchema.index({ scope: 1, groupId: 1 });

export const GuideChunk = model<GuideChunkDocument>('GuideChunk', guideChunkSchema);
