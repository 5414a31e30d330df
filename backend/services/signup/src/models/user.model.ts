// backend/services/signup/src/models/user.model.ts
import mongoose, { Schema } from "mongoose";

// Persistence-only document type (do not export to the HTTP layer)
export interface UserDocument {
  username: string;
  password: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  dateCreated: Date;
}

const now = () => new Date();

const userSchema = new Schema<UserDocument>(
  {
    // The unique index is what keeps two accounts from sharing a username
    // when registrations race; the service's pre-check only shapes the reply.
    username: {
      type: String,
      required: true,
      unique: true,
      lowercase: true,
      trim: true,
    },

    // bcrypt hash. Hidden by default; opt in via .select('+password').
    password: { type: String, required: true, select: false },

    email: { type: String, lowercase: true, trim: true },
    firstName: { type: String, trim: true },
    lastName: { type: String, trim: true },

    dateCreated: { type: Date, required: true, default: now },
  },
  {
    collection: "users",
    bufferCommands: false,
    timestamps: false,
    versionKey: false,
    strict: true,
    strictQuery: true,
  }
);

const UserModel = mongoose.model<UserDocument>("User", userSchema);
export default UserModel;
