/**
 * ============================================================================
 * MODULE PARTAGÉ - INDEX PRINCIPAL
 * ============================================================================
 *
 * Ce module centralise l'export de tous les types, constantes et utilitaires
 * partagés entre les services du formateur.
 *
 * UTILISATION :
 * ```typescript
 * import { ContentTree, KDP_RULES, parseXml } from '../shared';
 * ```
 *
 * @version 1.0.0
 */

// Types partagés
export * from './types';

// Constantes et erreurs
export * from './constants';
export * from './errors';

// Utilitaires partagés
export * from './utils';
