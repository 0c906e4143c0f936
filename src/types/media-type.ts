import { createEnum } from '../utils/create-enum.js';

const mediaTypeValues = createEnum(['video', 'audio'] as const);

export const MediaType = mediaTypeValues.object;

export type MediaType = typeof mediaTypeValues.type;

const qualityProfileValues = createEnum(['fast', 'best', 'hd'] as const);

export const QualityProfile = qualityProfileValues.object;

export type QualityProfile = typeof qualityProfileValues.type;
