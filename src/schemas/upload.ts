import { z } from 'zod';

export const SESSION_ID = z.string().trim().min(1).max(64);

export const UploadFields = z.object({
  session_id: SESSION_ID.optional(),
});

export interface DocumentUploadResponse {
  filename: string;
  pages: number;
  chunks: number;
  status: 'success';
  message: string;
  session_id: string;
}

export interface SessionInfo {
  exists: boolean;
  count: number;
  messages: number;
  createdAt?: string;
}
