export const RANDOM_SEED = Symbol('RANDOM_SEED');
export const ROUND_POLICY = Symbol('ROUND_POLICY');
export const ROUND_TIMINGS = Symbol('ROUND_TIMINGS');
export const ACTUATOR_PORT = Symbol('ACTUATOR_PORT');
