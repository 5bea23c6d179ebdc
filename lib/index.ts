export { Engine, type EngineOptions, type EngineStats, type SpecularTerm } from "./engine"
export { Environment, type Light } from "./environment"
export { Camera, type CameraOptions, type ProjectionOptions } from "./camera"
export { Model, type MaterialRange } from "./model"
export {
  SphereMode,
  ToonMode,
  toSphereMode,
  effectiveSphereMode,
  effectiveToonMode,
  writeMaterialUniforms,
  type Material,
  type MaterialTextureState,
  type Texture,
} from "./material"
export {
  LayoutMismatchError,
  ATTRIBUTE_LOCATIONS,
  BASE_STRIDE,
  validateStreams,
  vertexBufferLayouts,
  type BakedTransformSkinning,
  type IndexedBoneSkinning,
  type Skinning,
  type StageKind,
  type VertexLayout,
  type VertexStreams,
} from "./layout"
export { DEFAULT_BONE_COUNT, bakeVertexTransforms, skinTransform, type VertexSkin } from "./skinning"
export {
  PASS_ORDER,
  planFrame,
  takeSnapshot,
  type FrameOptions,
  type FrameSkinning,
  type FrameSnapshot,
  type PassDraw,
} from "./frame"
export { FRAME_UNIFORMS, MATERIAL_UNIFORMS, UniformBlock, UniformError, UniformLayout } from "./uniforms"
export { EDGE_SCALE, buildShaderSource } from "./shaders"
export {
  colorVertexStage,
  colorFragmentStage,
  edgeVertexStage,
  edgeFragmentStage,
  depthVertexStage,
  depthFragmentStage,
  linearizeDepth,
  whiteSampler,
  type ColorTextures,
  type Sampler2D,
  type StageVertex,
} from "./stages"
export { TextureCache, TextureUnit } from "./textures"
export { Mat4, Vec3, Vec4 } from "./math"
