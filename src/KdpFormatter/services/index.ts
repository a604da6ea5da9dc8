/**
 * Point d'entrée des services KdpFormatter
 */

export * from './package.service';
export * from './content-tree.service';
export * from './paragraph-classifier.service';
export * from './analyzer.service';
export * from './fixer.service';
export * from './report.service';
