import {
  Column,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  type Relation,
} from "typeorm";
import { Post } from "./Post";
import { User } from "./User";

@Entity({ name: "likes" })
export class Like {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "integer" })
  post_id!: number;

  @Column({ type: "integer" })
  user_id!: number;

  @ManyToOne(() => Post, (post) => post.likes, { onDelete: "CASCADE" })
  @JoinColumn({ name: "post_id" })
  post!: Relation<Post>;

  @ManyToOne(() => User, (user) => user.likes, { onDelete: "CASCADE" })
  @JoinColumn({ name: "user_id" })
  user!: Relation<User>;
}
