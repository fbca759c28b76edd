import type { EntityType } from "../../types/domain.js";

/**
 * Lexical patterns per entity type, applied in this order.
 * All patterns are matched case-insensitively and globally.
 */
export const ENTITY_PATTERNS: ReadonlyArray<readonly [EntityType, readonly RegExp[]]> = [
  [
    "method",
    [
      /\b(?:algorithm|approach|method|technique|model|framework|system|architecture)\b/gi,
      /\b(?:neural network|deep learning|machine learning|SVM|CNN|RNN|LSTM|transformer)\b/gi,
      /\b(?:classification|regression|clustering|segmentation|detection)\b/gi,
    ],
  ],
  [
    "metric",
    [
      /\b(?:accuracy|precision|recall|F1[- ]score|AUC|ROC)\b/gi,
      /\b(?:RMSE|MAE|MSE|error rate|performance)\b/gi,
      /\b\d+(?:\.\d+)?%/g,
    ],
  ],
  [
    "material",
    [
      /\b(?:dataset|corpus|benchmark|database)\b/gi,
      /\b(?:MNIST|ImageNet|COCO|TIMIT|LibriSpeech)\b/gi,
      /\b(?:training set|test set|validation set)\b/gi,
    ],
  ],
  [
    "task",
    [
      /\b(?:recognition|detection|classification|prediction|estimation)\b/gi,
      /\b(?:speech recognition|image classification|object detection)\b/gi,
      /\b(?:problem|task|challenge)\b/gi,
    ],
  ],
  [
    "tool",
    [
      /\b(?:TensorFlow|PyTorch|Keras|scikit-learn|MATLAB)\b/gi,
      /\b(?:Python|Java|R)\b/g,
      /(?<![\w+])C\+\+(?![\w+])/g,
      /\b(?:GPU|CPU|FPGA|embedded system)\b/gi,
    ],
  ],
];

export const PATTERN_CONFIDENCE = 0.8;
export const CONCEPT_CONFIDENCE = 0.6;
