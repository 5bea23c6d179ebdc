import { ATTRIBUTE_LOCATIONS, type StageKind, type VertexLayout } from "./layout"
import { FRAME_UNIFORMS, MATERIAL_UNIFORMS } from "./uniforms"

// Outline extrusion scale, applied on top of uEdgeSize * aEdgeScale
export const EDGE_SCALE = 0.05

// Pipeline-overridable constant: 1 switches the specular term from
// dot(position, half) to dot(normal, half)
export const NORMAL_SPECULAR_CONSTANT = "NORMAL_SPECULAR"

const L = ATTRIBUTE_LOCATIONS

const bindings = /* wgsl */ `
${FRAME_UNIFORMS.toWgsl()}

${MATERIAL_UNIFORMS.toWgsl()}

@group(0) @binding(0) var<uniform> frame: FrameUniforms;
@group(0) @binding(1) var<storage, read> uBoneTransform: array<mat4x4f>;

@group(1) @binding(0) var<uniform> material: MaterialUniforms;
@group(1) @binding(1) var uTexture: texture_2d<f32>;
@group(1) @binding(2) var uSphereTexture: texture_2d<f32>;
@group(1) @binding(3) var uToonTexture: texture_2d<f32>;
@group(1) @binding(4) var repeatSampler: sampler;
@group(1) @binding(5) var clampSampler: sampler;
`

const indexedBoneSkin = /* wgsl */ `
struct SkinInput {
  @location(${L.aBoneIndex}) aBoneIndex: vec4<u32>,
  @location(${L.aBoneWeights}) aBoneWeights: vec4f,
};

fn skinTransform(skin: SkinInput) -> mat4x4f {
  let w = skin.aBoneWeights;
  let weightSum = w.x + w.y + w.z + w.w;
  // exact zero marks a static vertex
  if (weightSum == 0.0) {
    return mat4x4f(
      vec4f(1.0, 0.0, 0.0, 0.0),
      vec4f(0.0, 1.0, 0.0, 0.0),
      vec4f(0.0, 0.0, 1.0, 0.0),
      vec4f(0.0, 0.0, 0.0, 1.0)
    );
  }
  let j = skin.aBoneIndex;
  return w.x * uBoneTransform[j.x]
    + w.y * uBoneTransform[j.y]
    + w.z * uBoneTransform[j.z]
    + w.w * uBoneTransform[j.w];
}
`

const bakedTransformSkin = /* wgsl */ `
struct SkinInput {
  @location(${L.aTransform0}) aTransform0: vec4f,
  @location(${L.aTransform1}) aTransform1: vec4f,
  @location(${L.aTransform2}) aTransform2: vec4f,
  @location(${L.aTransform3}) aTransform3: vec4f,
};

fn skinTransform(skin: SkinInput) -> mat4x4f {
  return mat4x4f(skin.aTransform0, skin.aTransform1, skin.aTransform2, skin.aTransform3);
}
`

// Shared by every stage so the deformed geometry is identical across passes
const common = /* wgsl */ `
fn deformedViewPosition(vertex: vec3f, transform: mat4x4f) -> vec4f {
  return frame.uModelViewM * (transform * vec4f(vertex, 1.0));
}

// OpenGL-style projection to WebGPU clip space (z from [-w, w] to [0, w])
fn toClip(viewPosition: vec4f) -> vec4f {
  var clip = frame.uProjectionM * viewPosition;
  clip.z = 0.5 * (clip.z + clip.w);
  return clip;
}
`

const colorStage = /* wgsl */ `
override ${NORMAL_SPECULAR_CONSTANT}: bool = false;

struct ColorVaryings {
  @invariant @builtin(position) position: vec4f,
  @location(0) viewPosition: vec3f,
  @location(1) normal: vec3f,
  @location(2) uv: vec2f,
};

@vertex fn vs(
  @location(${L.aVertex}) aVertex: vec3f,
  @location(${L.aNormal}) aNormal: vec3f,
  @location(${L.aUV}) aUV: vec2f,
  skin: SkinInput
) -> ColorVaryings {
  let transform = skinTransform(skin);
  let viewPosition = deformedViewPosition(aVertex, transform);
  var output: ColorVaryings;
  output.position = toClip(viewPosition);
  output.viewPosition = viewPosition.xyz;
  output.normal = normalize((frame.uITModelViewM * (transform * vec4f(aNormal, 0.0))).xyz);
  output.uv = aUV;
  return output;
}

@fragment fn fs(input: ColorVaryings) -> @location(0) vec4f {
  let n = normalize(input.normal);
  let p = input.viewPosition;

  // sampled up front: textureSample needs uniform control flow
  let texColor = textureSample(uTexture, repeatSampler, input.uv);
  let sphereColor = textureSample(uSphereTexture, repeatSampler, input.uv).rgb;

  var color = vec4f(1.0, 1.0, 1.0, 1.0) * texColor;
  if (material.uSphereTextureMode == 1.0) {
    color = vec4f(color.rgb * sphereColor, color.a);
  } else if (material.uSphereTextureMode == 3.0) {
    color = vec4f(color.rgb + sphereColor, color.a);
  }

  let l = normalize(frame.uLightPosition - p);
  let v = normalize(frame.uCameraPosition - p);
  let h = normalize(l + v);
  var specularBase = p;
  if (${NORMAL_SPECULAR_CONSTANT}) {
    specularBase = n;
  }

  let ambient = frame.uLightAmbient * material.uAmbientColor;
  let diffuse = frame.uLightDiffuse * material.uDiffuseColor * max(dot(n, l), 0.0);
  let specular = frame.uLightSpecular * material.uSpecularColor * pow(max(dot(specularBase, h), 0.0), material.uShininess);
  var rgb = clamp(color.rgb * (ambient + diffuse + specular), vec3f(0.0), vec3f(1.0));

  let toonColor = textureSample(uToonTexture, clampSampler, vec2f(0.0, 0.5 * (1.0 - dot(l, n)))).rgb;
  if (material.uIsToonTexture == 2.0) {
    rgb = rgb * toonColor;
  }

  return vec4f(rgb, material.uAlpha * color.a);
}
`

const edgeStage = /* wgsl */ `
const EDGE_SCALE: f32 = ${EDGE_SCALE.toFixed(2)};

@vertex fn vs(
  @location(${L.aVertex}) aVertex: vec3f,
  @location(${L.aNormal}) aNormal: vec3f,
  @location(${L.aEdgeScale}) aEdgeScale: f32,
  skin: SkinInput
) -> @invariant @builtin(position) vec4f {
  let transform = skinTransform(skin);
  let viewPosition = deformedViewPosition(aVertex, transform);
  let extruded = deformedViewPosition(aVertex + aNormal, transform);
  let delta = extruded.xyz - viewPosition.xyz;
  // a zero normal leaves the vertex in place
  let direction = select(vec3f(0.0), normalize(delta), length(delta) > 0.0);
  let offset = direction * material.uEdgeSize * aEdgeScale * EDGE_SCALE;
  return toClip(viewPosition + vec4f(offset, 0.0));
}

@fragment fn fs() -> @location(0) vec4f {
  return vec4f(material.uEdgeColor.rgb, material.uEdgeColor.a * material.uAlpha);
}
`

const depthStage = /* wgsl */ `
@vertex fn vs(
  @location(${L.aVertex}) aVertex: vec3f,
  skin: SkinInput
) -> @invariant @builtin(position) vec4f {
  return toClip(deformedViewPosition(aVertex, skinTransform(skin)));
}

@fragment fn fs(@builtin(position) fragCoord: vec4f) -> @location(0) vec4f {
  let zNear = frame.uNear;
  let zFar = frame.uFar;
  let ndcZ = fragCoord.z * 2.0 - 1.0;
  let linearDepth = (2.0 * zNear * zFar) / (zFar + zNear - ndcZ * (zFar - zNear));
  let d = linearDepth / zFar;
  return vec4f(d, d, d, 1.0);
}
`

const STAGES: Record<StageKind, string> = {
  color: colorStage,
  edge: edgeStage,
  depth: depthStage,
}

export function skinChunk(layout: VertexLayout): string {
  return layout === "indexed-bone" ? indexedBoneSkin : bakedTransformSkin
}

// Full WGSL module for one stage and layout variant; entry points are vs / fs
export function buildShaderSource(stage: StageKind, layout: VertexLayout): string {
  return [bindings, skinChunk(layout), common, STAGES[stage]].join("\n")
}
