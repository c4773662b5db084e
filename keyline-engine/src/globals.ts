// Simulation defaults shared by the scene and its entities

// An entity whose track moves it farther than this in one step is assumed to have
// teleported and gets zero velocity (previousFrame snaps to frame)
export const DEFAULT_TELEPORT_DISTANCE = 20

// Orbit and spline time is measured in seconds
export const TWO_PI = Math.PI * 2

// Default tolerance for framesApproxEqual
export const FRAME_EPSILON = 1e-6
