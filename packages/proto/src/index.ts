export * from './api/auth';
