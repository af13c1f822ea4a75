// Re-export all types
// Import from this file: import { Dataset, AnalyticsReports } from '@/lib/types'

// Core types
export * from './core';

// Report types
export * from './reports';
