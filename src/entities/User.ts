import {
  Column,
  Entity,
  OneToMany,
  PrimaryGeneratedColumn,
  type Relation,
} from "typeorm";
import { Like } from "./Like";
import { Post } from "./Post";

@Entity({ name: "users" })
export class User {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: "varchar" })
  username!: string;

  @Column({ type: "integer", nullable: true })
  age!: number | null;

  @OneToMany(() => Post, (post) => post.user, { cascade: true })
  posts!: Relation<Post>[];

  @OneToMany(() => Like, (like) => like.user, { cascade: true })
  likes!: Relation<Like>[];
}
