import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateBookingSchema1760000000000 implements MigrationInterface {
  name = 'CreateBookingSchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TYPE "booking_status_enum" AS ENUM ('PENDING', 'CONFIRMED', 'CANCELLED', 'EXPIRED')
    `);

    await queryRunner.query(`
      CREATE TABLE "schedules" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "movie_title" varchar(255) NOT NULL,
        "screen_number" integer NOT NULL,
        "start_time" TIMESTAMPTZ NOT NULL,
        "end_time" TIMESTAMPTZ NOT NULL,
        "ticket_price" decimal(10,2) NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_schedules_screen_start_time" UNIQUE ("screen_number", "start_time"),
        CONSTRAINT "PK_schedules" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "seats" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "schedule_id" uuid NOT NULL,
        "seat_label" varchar(10) NOT NULL,
        "row" varchar(5) NOT NULL,
        "seat_number" varchar(10) NOT NULL,
        CONSTRAINT "UQ_seats_schedule_seat_label" UNIQUE ("schedule_id", "seat_label"),
        CONSTRAINT "PK_seats" PRIMARY KEY ("id"),
        CONSTRAINT "FK_seats_schedule" FOREIGN KEY ("schedule_id")
          REFERENCES "schedules"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "seat_holds" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "schedule_id" uuid NOT NULL,
        "seat_label" varchar(10) NOT NULL,
        "user_id" uuid NOT NULL,
        "created_at" TIMESTAMPTZ NOT NULL,
        "expires_at" TIMESTAMPTZ NOT NULL,
        CONSTRAINT "UQ_seat_holds_schedule_seat_label" UNIQUE ("schedule_id", "seat_label"),
        CONSTRAINT "PK_seat_holds" PRIMARY KEY ("id"),
        CONSTRAINT "FK_seat_holds_schedule" FOREIGN KEY ("schedule_id")
          REFERENCES "schedules"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "bookings" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "booking_reference" varchar(32) NOT NULL,
        "user_id" uuid NOT NULL,
        "schedule_id" uuid NOT NULL,
        "status" "booking_status_enum" NOT NULL DEFAULT 'PENDING',
        "total_amount" decimal(10,2) NOT NULL,
        "idempotency_key" varchar(255),
        "expires_at" TIMESTAMPTZ NOT NULL,
        "confirmed_at" TIMESTAMPTZ,
        "cancelled_at" TIMESTAMPTZ,
        "created_at" TIMESTAMPTZ NOT NULL,
        "updated_at" TIMESTAMPTZ NOT NULL DEFAULT now(),
        CONSTRAINT "UQ_bookings_reference" UNIQUE ("booking_reference"),
        CONSTRAINT "UQ_bookings_idempotency_key" UNIQUE ("idempotency_key"),
        CONSTRAINT "PK_bookings" PRIMARY KEY ("id"),
        CONSTRAINT "FK_bookings_schedule" FOREIGN KEY ("schedule_id")
          REFERENCES "schedules"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "booked_seats" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "booking_id" uuid NOT NULL,
        "schedule_id" uuid NOT NULL,
        "seat_label" varchar(10) NOT NULL,
        "row" varchar(5) NOT NULL,
        "seat_number" varchar(10) NOT NULL,
        CONSTRAINT "UQ_booked_seats_booking_seat_label" UNIQUE ("booking_id", "seat_label"),
        CONSTRAINT "PK_booked_seats" PRIMARY KEY ("id"),
        CONSTRAINT "FK_booked_seats_booking" FOREIGN KEY ("booking_id")
          REFERENCES "bookings"("id") ON DELETE CASCADE ON UPDATE NO ACTION
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_seat_holds_expires_at" ON "seat_holds" ("expires_at")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_seat_holds_user" ON "seat_holds" ("user_id")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_bookings_pending_expires_at" ON "bookings" ("expires_at")
      WHERE "status" = 'PENDING'
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_bookings_user_created_at" ON "bookings" ("user_id", "created_at")
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_booked_seats_schedule_seat_label" ON "booked_seats" ("schedule_id", "seat_label")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_booked_seats_schedule_seat_label"`);
    await queryRunner.query(`DROP INDEX "IDX_bookings_user_created_at"`);
    await queryRunner.query(`DROP INDEX "IDX_bookings_pending_expires_at"`);
    await queryRunner.query(`DROP INDEX "IDX_seat_holds_user"`);
    await queryRunner.query(`DROP INDEX "IDX_seat_holds_expires_at"`);

    await queryRunner.query(`DROP TABLE "booked_seats"`);
    await queryRunner.query(`DROP TABLE "bookings"`);
    await queryRunner.query(`DROP TABLE "seat_holds"`);
    await queryRunner.query(`DROP TABLE "seats"`);
    await queryRunner.query(`DROP TABLE "schedules"`);

    await queryRunner.query(`DROP TYPE "booking_status_enum"`);
  }
}
