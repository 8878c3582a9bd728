export interface StoredImage {
  imageId: string;
  format: string;
  path: string;
  createdAt: Date;
  metadata: Record<string, unknown>;
}

export interface ImageAnalysisResult {
  imageId: string;
  imagePath: string | null;
  analysis: string | null;
  query: string | null;
  success: boolean;
  error?: string;
  timestamp: Date;
}
