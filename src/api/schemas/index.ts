export * from './studios';
export * from './classes';
export * from './bookings';
export * from './members';
export * from './performance';
export * from './telemetry';
