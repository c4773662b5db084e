export * from './errors'
export * from './globals'
export * from './graph/dependency-graph'
export * from './math/frame'
export * from './math/spline'
export * from './scene/entity'
export * from './scene/scene'
export * from './scene/scene-loader'
export * from './tracks/create-track'
export * from './tracks/expression'
export * from './tracks/literals'
export * from './tracks/parse-expression'
export * from './tracks/track'
export * from './tracks/variable-table'
