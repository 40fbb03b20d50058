import mongoose from "mongoose";
import { getConfig } from "../shared/config";

let isConnected = false;

export async function connectMongo() {
  if (isConnected) return;

  const { MONGODB_URI: mongoUri, DB_NAME: dbName } = getConfig();

  if (!mongoUri) {
    throw new Error("MONGODB_URI environment variable is not defined");
  }

  if (!mongoUri.startsWith("mongodb://") && !mongoUri.startsWith("mongodb+srv://")) {
    throw new Error("MONGODB_URI must start with 'mongodb://' or 'mongodb+srv://'");
  }

  try {
    await mongoose.connect(mongoUri, { dbName });
    isConnected = true;
    console.log(`✅ MongoDB connected to database: ${dbName}`);
  } catch (error) {
    console.error("❌ MongoDB connection failed:", error);
    throw error;
  }
}

mongoose.connection.on("disconnected", () => {
  isConnected = false;
  console.log("⚠️ MongoDB disconnected");
});
