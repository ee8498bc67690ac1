import { Document, Schema, model } from 'mongoose';
import type { AnswerMode } from '../services/guide/prompts';

export interface GroupSettingsDocument extends Document {
  groupId: string;
  defaultMode: AnswerMode;
  lastImportAt?: Date;
  createdAt: Date;
  updatedAt: Date;
}

const groupSettingsSchema = new Schema<GroupSettingsDocument>(
  {
    groupId: {
      type: String,
      required: true,
      unique: true,
      trim: true,
    },
    defaultMode: {
      type: String,
      enum: ['simple', 'detail'],
      default: 'simple',
    },
    lastImportAt: {
      type: Date,
    },
  },
  {
    timestamps: true,
  }
);

export const GroupSettings = model<GroupSettingsDocument>('GroupSettings', groupSettingsSchema);
