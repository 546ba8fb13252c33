/**
 * Service Lifecycle Module
 *
 * @module service-lifecycle
 */

export * from './service-bootstrap';
