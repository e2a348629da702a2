export { createClassesApi, type ClassesApi, type ClassFilters } from './classes';
export { createDnaApi, type DnaApi } from './dna';
export { createMembersApi, DEFAULT_MEMBER_INCLUDES, type BookingFilters, type MembersApi } from './members';
export { createPerformanceApi, type PerformanceApi } from './performance';
export { createStudiosApi, type GeoSearch, type StudiosApi } from './studios';
