import { Mat4, Vec3 } from "./math"

export interface CameraOptions {
  position?: Vec3
  target?: Vec3
  up?: Vec3
}

export interface ProjectionOptions {
  fov?: number // vertical, radians
  aspect?: number
  near?: number
  far?: number
}

export class Camera {
  position: Vec3 = new Vec3(0, 10, -30)
  target: Vec3 = new Vec3(0, 10, 0)
  up: Vec3 = new Vec3(0, 1, 0)
  fov: number = Math.PI / 4
  aspect: number = 1
  near: number = 0.1
  far: number = 50

  constructor(options?: CameraOptions & ProjectionOptions) {
    if (options) {
      this.set(options)
      this.setProjection(options)
    }
  }

  // Spherical placement around a target (alpha around Y, beta from +Y)
  static orbit(alpha: number, beta: number, radius: number, target: Vec3, fov: number = Math.PI / 4): Camera {
    const x = target.x + radius * Math.sin(beta) * Math.sin(alpha)
    const y = target.y + radius * Math.cos(beta)
    const z = target.z + radius * Math.sin(beta) * Math.cos(alpha)
    return new Camera({ position: new Vec3(x, y, z), target: target.clone(), fov })
  }

  set(options: CameraOptions) {
    this.position = options.position ?? this.position
    this.target = options.target ?? this.target
    this.up = options.up ?? this.up
  }

  setProjection(options: ProjectionOptions) {
    this.fov = options.fov ?? this.fov
    this.aspect = options.aspect ?? this.aspect
    this.near = options.near ?? this.near
    this.far = options.far ?? this.far
  }

  getPosition(): Vec3 {
    return this.position.clone()
  }

  getViewMatrix(): Mat4 {
    return Mat4.lookAt(this.position, this.target, this.up)
  }

  getProjectionMatrix(): Mat4 {
    return Mat4.perspective(this.fov, this.aspect, this.near, this.far)
  }
}
