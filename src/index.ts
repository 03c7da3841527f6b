export * from './asset-error';

export * from './config/asset-config';

export * from './compression';

export * from './content/textures/tim-image';
export * from './content/textures/tim.transcoder';

export * from './content/models/model-color';
export * from './content/models/primitive';
export * from './content/models/prm-model';
export * from './content/models/prm-model.transcoder';
export * from './content/models/texture-binding';

export * from './content/asset-pipeline';

export * from './util/png';
