export { analyze, analyzeCommand } from './analyze_command';
