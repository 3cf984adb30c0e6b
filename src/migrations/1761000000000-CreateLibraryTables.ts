import { MigrationInterface, QueryRunner } from "typeorm";

export class CreateLibraryTables1761000000000 implements MigrationInterface {
    name = 'CreateLibraryTables1761000000000'

    public async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE TABLE "author" ("id" SERIAL NOT NULL, "firstName" character varying(100) NOT NULL, "lastName" character varying(100) NOT NULL, "nationality" character varying(100) NOT NULL, "otherDetails" text, CONSTRAINT "PK_author_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "category" ("id" SERIAL NOT NULL, "description" character varying(100) NOT NULL, "otherDetails" text, CONSTRAINT "PK_category_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "book" ("isbn" character varying(20) NOT NULL, "title" character varying(200) NOT NULL, "publisher" character varying(100) NOT NULL, "publicationDate" date NOT NULL, "categoryId" integer NOT NULL, "authorId" integer NOT NULL, "otherDetails" text, "available" boolean NOT NULL DEFAULT true, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), "updatedAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_book_isbn" PRIMARY KEY ("isbn"))`);
        await queryRunner.query(`CREATE TABLE "borrower" ("id" SERIAL NOT NULL, "firstName" character varying(100) NOT NULL, "lastName" character varying(100) NOT NULL, "address" character varying(200), "email" character varying(100), "active" boolean NOT NULL DEFAULT true, "createdAt" TIMESTAMP NOT NULL DEFAULT now(), CONSTRAINT "PK_borrower_id" PRIMARY KEY ("id"))`);
        await queryRunner.query(`CREATE TABLE "loan" ("id" SERIAL NOT NULL, "bookIsbn" character varying(20) NOT NULL, "borrowerId" integer NOT NULL, "loanedAt" TIMESTAMP NOT NULL, "dueAt" TIMESTAMP NOT NULL, "returnedAt" TIMESTAMP, "fee" numeric(10,2) NOT NULL DEFAULT '0', "otherDetails" text, CONSTRAINT "PK_loan_id" PRIMARY KEY ("id"))`);
        // At most one open loan per book
        await queryRunner.query(`CREATE UNIQUE INDEX "UQ_loan_open_book" ON "loan" ("bookIsbn") WHERE "returnedAt" IS NULL`);
        await queryRunner.query(`ALTER TABLE "book" ADD CONSTRAINT "FK_book_category" FOREIGN KEY ("categoryId") REFERENCES "category"("id") ON DELETE NO ACTION ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "book" ADD CONSTRAINT "FK_book_author" FOREIGN KEY ("authorId") REFERENCES "author"("id") ON DELETE NO ACTION ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "loan" ADD CONSTRAINT "FK_loan_book" FOREIGN KEY ("bookIsbn") REFERENCES "book"("isbn") ON DELETE NO ACTION ON UPDATE NO ACTION`);
        await queryRunner.query(`ALTER TABLE "loan" ADD CONSTRAINT "FK_loan_borrower" FOREIGN KEY ("borrowerId") REFERENCES "borrower"("id") ON DELETE NO ACTION ON UPDATE NO ACTION`);
    }

    public async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`ALTER TABLE "loan" DROP CONSTRAINT "FK_loan_borrower"`);
        await queryRunner.query(`ALTER TABLE "loan" DROP CONSTRAINT "FK_loan_book"`);
        await queryRunner.query(`ALTER TABLE "book" DROP CONSTRAINT "FK_book_author"`);
        await queryRunner.query(`ALTER TABLE "book" DROP CONSTRAINT "FK_book_category"`);
        await queryRunner.query(`DROP INDEX "public"."UQ_loan_open_book"`);
        await queryRunner.query(`DROP TABLE "loan"`);
        await queryRunner.query(`DROP TABLE "borrower"`);
        await queryRunner.query(`DROP TABLE "book"`);
        await queryRunner.query(`DROP TABLE "category"`);
        await queryRunner.query(`DROP TABLE "author"`);
    }

}
