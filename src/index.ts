export * from './models/Archetype';
export * from './models/StatRecord';
export * from './models/CalibrationProfile';
export * from './services/ClassificationErrors';
export { calibrationStore, CalibrationStore, validateProfile, DEFAULT_AXIS_THRESHOLD } from './services/CalibrationStore';
export * from './services/ReferencePopulationService';
export { featureNormalizerService, FeatureNormalizerService } from './services/FeatureNormalizerService';
export * from './services/AxisScorerService';
export * from './services/ArchetypeAssignerService';
export * from './services/ClassificationReportBuilder';
export * from './services/ArchetypeClassificationService';
export * from './services/ReportCache';
export * from './services/StatDerivationService';
export * from './services/SeasonStatsCsvService';
export * from './services/ArchetypeEvaluationService';
