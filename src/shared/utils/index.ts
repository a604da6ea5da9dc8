/**
 * ============================================================================
 * UTILITAIRES PARTAGÉS - INDEX
 * ============================================================================
 *
 * Point d'entrée centralisé pour tous les utilitaires partagés.
 *
 * @version 1.0.0
 */

export * from './xml.utils';
export * from './text.utils';
export * from './docx.utils';
export * from './style-detector.utils';
