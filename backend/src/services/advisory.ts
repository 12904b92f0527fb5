import { UnknownLabelError } from '../errors.js';
import { LESION_LABELS, type Advisory, type LesionLabel } from '../types/contracts.js';

const ADVISORIES: Readonly<Record<LesionLabel, Advisory>> = {
  'Melanocytic nevus': {
    explanation:
      'Melanocytic nevus is a condition where the skin surface has coloured patches that come from melanocytes, the cells that form skin and hair colour.',
    suggestion: 'See the nearest doctor promptly if it grows quickly, is easily injured, or bleeds.'
  },
  'Squamous cell carcinoma': {
    explanation:
      'Squamous cell carcinoma is a common type of skin cancer. It often grows on parts of the body that are frequently exposed to UV light.',
    suggestion: 'See the nearest doctor promptly to minimise the spread of the cancer.'
  },
  'Vascular lesion': {
    explanation:
      'Vascular lesion is a condition categorised as a cancer or tumour. It often appears on the head and neck.',
    suggestion: 'See the nearest doctor promptly to learn how dangerous the condition is.'
  }
};

export function isLesionLabel(value: string): value is LesionLabel {
  return LESION_LABELS.some(label => label === value);
}

export function resolveAdvisory(label: string): Advisory {
  if (!isLesionLabel(label)) {
    throw new UnknownLabelError(label);
  }
  const { explanation, suggestion } = ADVISORIES[label];
  return { explanation, suggestion };
}
