import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

/**
 * One indexed excerpt of a transcribed call. Rows are written by the ingestion
 * job and are read-only here; the `embedding vector(D)` column is only touched
 * through the raw nearest-neighbour query in DialoguesService.
 */
@Entity('dialogues', { synchronize: false })
export class Dialogue {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'dialogue_id' })
  dialogueId!: string;

  @Column('text')
  content!: string;
}
