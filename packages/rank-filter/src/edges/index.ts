export {
  edgePadding,
  extendEdges,
  extendEdgesBy,
  isEdgeMode,
} from './extend.js';
