/**
 * StoredDocument Model - Named whole-document storage for the Mongo backend
 */

import mongoose, { Schema, model, type Model, type InferSchemaType } from "mongoose";

const StoredDocumentSchema = new Schema(
  {
    // Document name ("violations", "temp_actions", ... or "<name>.bak.<ts>")
    name: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },

    payload: {
      type: Schema.Types.Mixed,
      default: null,
    },
  },
  {
    timestamps: true,
    minimize: false,
  },
);

type IStoredDocumentBase = InferSchemaType<typeof StoredDocumentSchema>;

export interface IStoredDocument extends IStoredDocumentBase {
  _id: mongoose.Types.ObjectId;
}

/**
 * Hot-reload safe model export
 */
const StoredDocument: Model<IStoredDocument> = mongoose.models.StoredDocument || model<IStoredDocument>("StoredDocument", StoredDocumentSchema);

export default StoredDocument;
