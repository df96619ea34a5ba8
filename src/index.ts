export * from './physics/types';
export * from './physics/math_solvers';
export * from './physics/Shape';
export * from './physics/lights';
export * from './physics/Scene';
export * from './physics/Lighting';
export * from './physics/Shader';
export * from './physics/Camera';
export * from './physics/PixelBuffer';
export * from './physics/Renderer';
export * from './physics/RenderPool';
export * from './physics/errors';
export * from './state/config';
export * from './state/sceneSerializer';
export * from './io/pngWriter';
export * from './presets';
