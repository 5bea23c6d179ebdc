import { Camera, type CameraOptions, type ProjectionOptions } from "./camera"
import { Mat4, Vec3 } from "./math"
import { UniformBlock } from "./uniforms"

export interface Light {
  position: Vec3
  ambient: Vec3
  diffuse: Vec3
  specular: Vec3
}

/**
 * Camera, projection, light and model placement for one model. Matrices are
 * derived on demand; the frame snapshot reads them once per frame.
 */
export class Environment {
  camera: Camera = new Camera()
  light: Light = {
    position: new Vec3(0, 0, 0),
    ambient: new Vec3(1, 1, 1),
    diffuse: new Vec3(0, 0, 0),
    specular: new Vec3(0, 0, 0),
  }
  modelMatrix: Mat4 = Mat4.identity()

  setLight(light: Partial<Light>) {
    this.light = { ...this.light, ...light }
  }

  setCamera(options: CameraOptions) {
    this.camera.set(options)
  }

  setProjection(options: ProjectionOptions) {
    this.camera.setProjection(options)
  }

  getViewMatrix(): Mat4 {
    return this.camera.getViewMatrix()
  }

  getProjectionMatrix(): Mat4 {
    return this.camera.getProjectionMatrix()
  }

  getModelViewMatrix(): Mat4 {
    return this.getViewMatrix().multiply(this.modelMatrix)
  }

  // Inverse-transpose of the model-view matrix, for normals under non-uniform scale
  getNormalMatrix(): Mat4 {
    return this.getModelViewMatrix().inverse().transpose()
  }

  writeFrameUniforms(block: UniformBlock) {
    const modelView = this.getModelViewMatrix()
    block.setMat4("uProjectionM", this.getProjectionMatrix())
    block.setMat4("uModelViewM", modelView)
    block.setMat4("uITModelViewM", modelView.inverse().transpose())
    block.setVec3("uLightAmbient", this.light.ambient)
    block.setVec3("uLightDiffuse", this.light.diffuse)
    block.setVec3("uLightSpecular", this.light.specular)
    block.setVec3("uLightPosition", this.light.position)
    block.setVec3("uCameraPosition", this.camera.getPosition())
    block.setFloat("uNear", this.camera.near)
    block.setFloat("uFar", this.camera.far)
  }
}
