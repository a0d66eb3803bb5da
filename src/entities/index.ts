export * from './dialogue.entity';
