export const LESION_LABELS = ['Melanocytic nevus', 'Squamous cell carcinoma', 'Vascular lesion'] as const;

export type LesionLabel = (typeof LESION_LABELS)[number];

export const INPUT_SIZE = 224;

export type InputShape = readonly [1, typeof INPUT_SIZE, typeof INPUT_SIZE, 3];

export type ImageFormat = 'jpeg' | 'png' | 'webp' | 'gif';

export type PreprocessedImage = {
  shape: InputShape;
  data: Float32Array;
  format: ImageFormat;
};

export type InferenceResult = {
  confidence: number;
  label: LesionLabel;
};

export type Advisory = {
  explanation: string;
  suggestion: string;
};

export type PredictionRecord = {
  id: string;
  result: LesionLabel;
  explanation: string;
  suggestion: string;
  confidence: number;
  createdAt: string;
};

export type PredictionData = {
  id: string;
  result: LesionLabel;
  explanation: string;
  suggestion: string;
  confidenceScore: number;
  createdAt: string;
};

export type SuccessBody = {
  status: 'success';
  message: string;
  data: PredictionData;
};

export type ErrorBody = {
  status: 'fail' | 'error';
  message: string;
};
