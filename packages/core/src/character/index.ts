export { PoseModule, POSE_MODULE, poseDescriptionSchema, revisedTextSchema } from './pose-module.js';
export type { PoseModuleConfig, PoseDescription, PoseInputs } from './pose-module.js';
