/**
 * Pipeline Module
 *
 * Middleware pipeline composition
 */

export { PipelineBuilder, createPipeline, compose } from './builder';
