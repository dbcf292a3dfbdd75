/**
 * Central type definitions for the report launcher
 *
 * This barrel file exports all types for convenient importing:
 * import { LauncherConfig, LaunchResult } from '../types';
 */

// Launcher types
export * from "./launcher";

// Error handling types
export * from "./errors";
