import { GoogleGenAI } from "@google/genai";
import { ImageAnnotatorClient } from "@google-cloud/vision";

export function createGoogleClient(apiKey: string | undefined): GoogleGenAI {
  if (!apiKey) {
    throw new Error("GEMINI_API_KEY is not set (pass --api-key or set the environment variable)");
  }
  return new GoogleGenAI({ apiKey });
}

/**
 * Cloud Vision client. Credentials come from `keyFilename` when given,
 * otherwise from application default credentials.
 */
export function createVisionClient(params: {
  projectId: string;
  keyFilename?: string;
}): ImageAnnotatorClient {
  return new ImageAnnotatorClient({
    projectId: params.projectId,
    ...(params.keyFilename ? { keyFilename: params.keyFilename } : {}),
  });
}
