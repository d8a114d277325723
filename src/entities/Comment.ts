import {
  Column,
  Entity,
  JoinColumn,
  OneToOne,
  PrimaryGeneratedColumn,
  type Relation,
} from "typeorm";
import { Post } from "./Post";

@Entity({ name: "comments" })
export class Comment {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "text" })
  content!: string;

  @Column({ type: "integer" })
  post_id!: number;

  @OneToOne(() => Post, (post) => post.comment, { onDelete: "CASCADE" })
  @JoinColumn({ name: "post_id" })
  post!: Relation<Post>;
}
