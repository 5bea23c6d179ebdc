export class Vec3 {
  x: number
  y: number
  z: number

  constructor(x: number, y: number, z: number) {
    this.x = x
    this.y = y
    this.z = z
  }

  static fromArray(values: ArrayLike<number>, offset: number = 0): Vec3 {
    return new Vec3(values[offset], values[offset + 1], values[offset + 2])
  }

  add(other: Vec3): Vec3 {
    return new Vec3(this.x + other.x, this.y + other.y, this.z + other.z)
  }

  subtract(other: Vec3): Vec3 {
    return new Vec3(this.x - other.x, this.y - other.y, this.z - other.z)
  }

  // Component-wise product (color modulation)
  multiply(other: Vec3): Vec3 {
    return new Vec3(this.x * other.x, this.y * other.y, this.z * other.z)
  }

  length(): number {
    return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z)
  }

  normalize(): Vec3 {
    const len = this.length()
    if (len === 0) return new Vec3(0, 0, 0)
    return new Vec3(this.x / len, this.y / len, this.z / len)
  }

  cross(other: Vec3): Vec3 {
    return new Vec3(
      this.y * other.z - this.z * other.y,
      this.z * other.x - this.x * other.z,
      this.x * other.y - this.y * other.x
    )
  }

  dot(other: Vec3): number {
    return this.x * other.x + this.y * other.y + this.z * other.z
  }

  scale(scalar: number): Vec3 {
    return new Vec3(this.x * scalar, this.y * scalar, this.z * scalar)
  }

  clamp(min: number, max: number): Vec3 {
    return new Vec3(
      Math.min(max, Math.max(min, this.x)),
      Math.min(max, Math.max(min, this.y)),
      Math.min(max, Math.max(min, this.z))
    )
  }

  clone(): Vec3 {
    return new Vec3(this.x, this.y, this.z)
  }

  toArray(): [number, number, number] {
    return [this.x, this.y, this.z]
  }
}

export class Vec4 {
  x: number
  y: number
  z: number
  w: number

  constructor(x: number, y: number, z: number, w: number) {
    this.x = x
    this.y = y
    this.z = z
    this.w = w
  }

  static fromArray(values: ArrayLike<number>, offset: number = 0): Vec4 {
    return new Vec4(values[offset], values[offset + 1], values[offset + 2], values[offset + 3])
  }

  xyz(): Vec3 {
    return new Vec3(this.x, this.y, this.z)
  }

  add(other: Vec4): Vec4 {
    return new Vec4(this.x + other.x, this.y + other.y, this.z + other.z, this.w + other.w)
  }

  toArray(): [number, number, number, number] {
    return [this.x, this.y, this.z, this.w]
  }
}

// Column-major 4x4 matrix, values[column * 4 + row], same memory order as WGSL mat4x4f
export class Mat4 {
  values: Float32Array

  constructor(values: Float32Array) {
    this.values = values
  }

  static identity(): Mat4 {
    return new Mat4(new Float32Array([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1]))
  }

  static zero(): Mat4 {
    return new Mat4(new Float32Array(16))
  }

  // Copies 16 floats starting at offset (one matrix out of a packed array)
  static fromArray(values: ArrayLike<number>, offset: number = 0): Mat4 {
    const out = new Float32Array(16)
    for (let i = 0; i < 16; i++) out[i] = values[offset + i]
    return new Mat4(out)
  }

  static fromColumns(c0: Vec4, c1: Vec4, c2: Vec4, c3: Vec4): Mat4 {
    return new Mat4(
      new Float32Array([c0.x, c0.y, c0.z, c0.w, c1.x, c1.y, c1.z, c1.w, c2.x, c2.y, c2.z, c2.w, c3.x, c3.y, c3.z, c3.w])
    )
  }

  static translation(x: number, y: number, z: number): Mat4 {
    return new Mat4(new Float32Array([1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, x, y, z, 1]))
  }

  static scaling(x: number, y: number, z: number): Mat4 {
    return new Mat4(new Float32Array([x, 0, 0, 0, 0, y, 0, 0, 0, 0, z, 0, 0, 0, 0, 1]))
  }

  // Right-handed OpenGL perspective, NDC z in [-1, 1]
  static perspective(fov: number, aspect: number, near: number, far: number): Mat4 {
    const f = 1.0 / Math.tan(fov / 2)
    const rangeInv = 1.0 / (near - far)

    return new Mat4(
      new Float32Array([
        f / aspect,
        0,
        0,
        0,
        0,
        f,
        0,
        0,
        0,
        0,
        (far + near) * rangeInv,
        -1,
        0,
        0,
        2 * near * far * rangeInv,
        0,
      ])
    )
  }

  // Right-handed look-at: the camera looks down its local -Z
  static lookAt(eye: Vec3, target: Vec3, up: Vec3): Mat4 {
    const forward = target.subtract(eye).normalize()
    const right = forward.cross(up).normalize()
    const upVec = right.cross(forward)

    return new Mat4(
      new Float32Array([
        right.x,
        upVec.x,
        -forward.x,
        0,
        right.y,
        upVec.y,
        -forward.y,
        0,
        right.z,
        upVec.z,
        -forward.z,
        0,
        -right.dot(eye),
        -upVec.dot(eye),
        forward.dot(eye),
        1,
      ])
    )
  }

  multiply(other: Mat4): Mat4 {
    // result = this * other
    const out = new Float32Array(16)
    const a = this.values
    const b = other.values
    for (let c = 0; c < 4; c++) {
      const b0 = b[c * 4 + 0]
      const b1 = b[c * 4 + 1]
      const b2 = b[c * 4 + 2]
      const b3 = b[c * 4 + 3]
      out[c * 4 + 0] = a[0] * b0 + a[4] * b1 + a[8] * b2 + a[12] * b3
      out[c * 4 + 1] = a[1] * b0 + a[5] * b1 + a[9] * b2 + a[13] * b3
      out[c * 4 + 2] = a[2] * b0 + a[6] * b1 + a[10] * b2 + a[14] * b3
      out[c * 4 + 3] = a[3] * b0 + a[7] * b1 + a[11] * b2 + a[15] * b3
    }
    return new Mat4(out)
  }

  // Element-wise sum, used for weighted matrix blending
  add(other: Mat4): Mat4 {
    const out = new Float32Array(16)
    for (let i = 0; i < 16; i++) out[i] = this.values[i] + other.values[i]
    return new Mat4(out)
  }

  scale(scalar: number): Mat4 {
    const out = new Float32Array(16)
    for (let i = 0; i < 16; i++) out[i] = this.values[i] * scalar
    return new Mat4(out)
  }

  transform(v: Vec4): Vec4 {
    const m = this.values
    return new Vec4(
      m[0] * v.x + m[4] * v.y + m[8] * v.z + m[12] * v.w,
      m[1] * v.x + m[5] * v.y + m[9] * v.z + m[13] * v.w,
      m[2] * v.x + m[6] * v.y + m[10] * v.z + m[14] * v.w,
      m[3] * v.x + m[7] * v.y + m[11] * v.z + m[15] * v.w
    )
  }

  transformPoint(p: Vec3): Vec3 {
    return this.transform(new Vec4(p.x, p.y, p.z, 1)).xyz()
  }

  transpose(): Mat4 {
    const m = this.values
    const out = new Float32Array(16)
    for (let c = 0; c < 4; c++) {
      for (let r = 0; r < 4; r++) {
        out[r * 4 + c] = m[c * 4 + r]
      }
    }
    return new Mat4(out)
  }

  clone(): Mat4 {
    return new Mat4(this.values.slice())
  }

  // Full 4x4 inverse (adjugate method), valid for non-orthonormal matrices
  inverse(): Mat4 {
    const m = this.values
    const out = new Float32Array(16)

    const a00 = m[0],
      a01 = m[1],
      a02 = m[2],
      a03 = m[3]
    const a10 = m[4],
      a11 = m[5],
      a12 = m[6],
      a13 = m[7]
    const a20 = m[8],
      a21 = m[9],
      a22 = m[10],
      a23 = m[11]
    const a30 = m[12],
      a31 = m[13],
      a32 = m[14],
      a33 = m[15]

    const b00 = a00 * a11 - a01 * a10
    const b01 = a00 * a12 - a02 * a10
    const b02 = a00 * a13 - a03 * a10
    const b03 = a01 * a12 - a02 * a11
    const b04 = a01 * a13 - a03 * a11
    const b05 = a02 * a13 - a03 * a12
    const b06 = a20 * a31 - a21 * a30
    const b07 = a20 * a32 - a22 * a30
    const b08 = a20 * a33 - a23 * a30
    const b09 = a21 * a32 - a22 * a31
    const b10 = a21 * a33 - a23 * a31
    const b11 = a22 * a33 - a23 * a32

    let det = b00 * b11 - b01 * b10 + b02 * b09 + b03 * b08 - b04 * b07 + b05 * b06

    if (Math.abs(det) < 1e-10) {
      console.warn("[Math] Matrix is not invertible (determinant near zero)")
      return Mat4.identity()
    }

    det = 1.0 / det

    out[0] = (a11 * b11 - a12 * b10 + a13 * b09) * det
    out[1] = (a02 * b10 - a01 * b11 - a03 * b09) * det
    out[2] = (a31 * b05 - a32 * b04 + a33 * b03) * det
    out[3] = (a22 * b04 - a21 * b05 - a23 * b03) * det
    out[4] = (a12 * b08 - a10 * b11 - a13 * b07) * det
    out[5] = (a00 * b11 - a02 * b08 + a03 * b07) * det
    out[6] = (a32 * b02 - a30 * b05 - a33 * b01) * det
    out[7] = (a20 * b05 - a22 * b02 + a23 * b01) * det
    out[8] = (a10 * b10 - a11 * b08 + a13 * b06) * det
    out[9] = (a01 * b08 - a00 * b10 - a03 * b06) * det
    out[10] = (a30 * b04 - a31 * b02 + a33 * b00) * det
    out[11] = (a21 * b02 - a20 * b04 - a23 * b00) * det
    out[12] = (a11 * b07 - a10 * b09 - a12 * b06) * det
    out[13] = (a00 * b09 - a01 * b07 + a02 * b06) * det
    out[14] = (a31 * b01 - a30 * b03 - a32 * b00) * det
    out[15] = (a20 * b03 - a21 * b01 + a22 * b00) * det

    return new Mat4(out)
  }
}
