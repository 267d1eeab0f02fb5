import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from "typeorm";

@Entity('customers')
export class Customer {
    @PrimaryGeneratedColumn({ type: "bigint" })
    id!: string;

    @Column('varchar', { length: 100, nullable: false })
    name!: string;

    @Index({ unique: true })
    @Column('varchar', { length: 190, nullable: false })
    email!: string;

    @Column('varchar', { name: "password_hash", length: 255, nullable: false })
    passwordHash!: string;

    @Column('simple-array', { nullable: false })
    roles!: string[];

    @CreateDateColumn({
        name: "created_at",
        type: 'datetime',
        precision: 3,
        default: () => 'CURRENT_TIMESTAMP(3)',
    })
    createdAt!: Date;

    @UpdateDateColumn({
        name: "updated_at",
        type: 'datetime',
        precision: 3,
        default: () => 'CURRENT_TIMESTAMP(3)',
    })
    updatedAt!: Date;
}
