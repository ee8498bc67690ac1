import { Document, Schema, model } from 'mongoose';

export interface GuideAliasDocument extends Document {
  alias: string;
  canonical: string;
  type: string;
  createdAt: Date;
  updatedAt: Date;
}

const guideAliasSchema = new Schema<GuideAliasDocument>(
  {
    alias: {
      type: String,
      required: true,
      unique: true,
      trim: true,
      lowercase: true,
    },
    canonical: {
      type: String,
      required: true,
      trim: true,
    },
    type: {
      type: String,
      trim: true,
      default: 'other',
    },
  },
  {
    timestamps: true,
  }
);

export const GuideAlias = model<GuideAliasDocument>('GuideAlias', guideAliasSchema);
