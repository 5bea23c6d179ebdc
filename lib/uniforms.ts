import { Mat4, Vec3, Vec4 } from "./math"

export type UniformType = "f32" | "vec3f" | "vec4f" | "mat4x4f"

export interface UniformField {
  name: string
  type: UniformType
}

interface UniformSlot {
  type: UniformType
  offset: number // in floats
}

// WGSL host-shareable alignment and size rules, in bytes
const TYPE_INFO: Record<UniformType, { align: number; size: number }> = {
  f32: { align: 4, size: 4 },
  vec3f: { align: 16, size: 12 },
  vec4f: { align: 16, size: 16 },
  mat4x4f: { align: 16, size: 64 },
}

export class UniformError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "UniformError"
  }
}

const alignTo = (value: number, alignment: number) => Math.ceil(value / alignment) * alignment

/**
 * Field list of a WGSL uniform struct. Generates both the struct declaration
 * spliced into the shaders and the float offsets used to pack the host copy.
 */
export class UniformLayout {
  readonly structName: string
  readonly fields: readonly UniformField[]
  readonly byteSize: number
  private slots = new Map<string, UniformSlot>()

  constructor(structName: string, fields: UniformField[]) {
    this.structName = structName
    this.fields = fields

    let cursor = 0
    let maxAlign = 4
    for (const field of fields) {
      if (this.slots.has(field.name)) {
        throw new UniformError(`Duplicate uniform "${field.name}" in ${structName}`)
      }
      const info = TYPE_INFO[field.type]
      cursor = alignTo(cursor, info.align)
      this.slots.set(field.name, { type: field.type, offset: cursor / 4 })
      cursor += info.size
      maxAlign = Math.max(maxAlign, info.align)
    }
    // Uniform buffer bindings must be a multiple of 16 bytes
    this.byteSize = alignTo(cursor, Math.max(maxAlign, 16))
  }

  has(name: string): boolean {
    return this.slots.has(name)
  }

  slot(name: string): UniformSlot {
    const slot = this.slots.get(name)
    if (!slot) {
      throw new UniformError(`Unknown uniform "${name}" in ${this.structName}`)
    }
    return slot
  }

  toWgsl(): string {
    const body = this.fields.map((field) => `  ${field.name}: ${field.type},`).join("\n")
    return `struct ${this.structName} {\n${body}\n};`
  }
}

const COMPONENTS: Record<UniformType, number> = {
  f32: 1,
  vec3f: 3,
  vec4f: 4,
  mat4x4f: 16,
}

// Host copy of one uniform struct, written by name
export class UniformBlock {
  readonly layout: UniformLayout
  readonly data: Float32Array<ArrayBuffer>

  constructor(layout: UniformLayout) {
    this.layout = layout
    this.data = new Float32Array(layout.byteSize / 4)
  }

  set(name: string, value: number | ArrayLike<number>): void {
    const slot = this.layout.slot(name)
    const expected = COMPONENTS[slot.type]
    if (typeof value === "number") {
      if (expected !== 1) {
        throw new UniformError(`Uniform "${name}" expects ${expected} components, got a scalar`)
      }
      this.data[slot.offset] = value
      return
    }
    if (value.length !== expected) {
      throw new UniformError(`Uniform "${name}" expects ${expected} components, got ${value.length}`)
    }
    for (let i = 0; i < expected; i++) {
      this.data[slot.offset + i] = value[i]
    }
  }

  setFloat(name: string, value: number): void {
    this.set(name, value)
  }

  setVec3(name: string, value: Vec3): void {
    this.set(name, value.toArray())
  }

  setVec4(name: string, value: Vec4): void {
    this.set(name, value.toArray())
  }

  setMat4(name: string, value: Mat4): void {
    this.set(name, value.values)
  }

  getFloat(name: string): number {
    return this.data[this.layout.slot(name).offset]
  }

  getVec3(name: string): Vec3 {
    return Vec3.fromArray(this.data, this.layout.slot(name).offset)
  }

  getVec4(name: string): Vec4 {
    return Vec4.fromArray(this.data, this.layout.slot(name).offset)
  }

  getMat4(name: string): Mat4 {
    return Mat4.fromArray(this.data, this.layout.slot(name).offset)
  }

  clone(): UniformBlock {
    const copy = new UniformBlock(this.layout)
    copy.data.set(this.data)
    return copy
  }
}

// Per-frame state shared by every stage (group 0, binding 0)
export const FRAME_UNIFORMS = new UniformLayout("FrameUniforms", [
  { name: "uProjectionM", type: "mat4x4f" },
  { name: "uModelViewM", type: "mat4x4f" },
  { name: "uITModelViewM", type: "mat4x4f" },
  { name: "uLightAmbient", type: "vec3f" },
  { name: "uLightDiffuse", type: "vec3f" },
  { name: "uLightSpecular", type: "vec3f" },
  { name: "uLightPosition", type: "vec3f" },
  { name: "uCameraPosition", type: "vec3f" },
  { name: "uNear", type: "f32" },
  { name: "uFar", type: "f32" },
])

// Per-material state (group 1, binding 0), shared by the color and edge stages
export const MATERIAL_UNIFORMS = new UniformLayout("MaterialUniforms", [
  { name: "uAmbientColor", type: "vec3f" },
  { name: "uSpecularColor", type: "vec3f" },
  { name: "uDiffuseColor", type: "vec3f" },
  { name: "uAlpha", type: "f32" },
  { name: "uShininess", type: "f32" },
  { name: "uSphereTextureMode", type: "f32" },
  { name: "uIsToonTexture", type: "f32" },
  { name: "uEdgeColor", type: "vec4f" },
  { name: "uEdgeSize", type: "f32" },
])
