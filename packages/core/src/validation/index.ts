export {
  typeRefSchema,
  exprSchema,
  literalValueSchema,
  sourceLocationSchema,
  memberSchema,
  typeShapeSchema,
  memberConfigSchema,
  mappingDeclarationSchema,
  analysisUnitSchema,
  parseAnalysisUnit,
} from './schemas.js';
