/**
 * Synthetic insert payloads built with @faker-js/faker.
 *
 * Documents are deliberately heterogeneous (optional sub-documents, union
 * typed fields, variable-length arrays) so the workload exercises realistic
 * BSON shapes rather than fixed-size rows.
 */

import { Faker, en } from "@faker-js/faker";
import { hashStringToSeed } from "../../utils/seed-manager.js";
import { logger } from "../../utils/logger.js";
import type { DocumentKey, DocumentRecord } from "../../types/workload.js";

const CATEGORIES = ["tech", "finance", "health", "travel", "food", "sports"] as const;
const SOURCES = ["web", "mobile", "partner", "import"] as const;
const SENIORITY = ["jr", "mid", "sr"] as const;

export interface DocumentFactoryOptions {
  /** Seed for reproducible payloads */
  seed?: string | number;
  /** Skip the faker profile and emit only routing fields plus a random token */
  minimal?: boolean;
}

export class DocumentFactory {
  private readonly faker: Faker;
  private readonly minimal: boolean;

  constructor(options: DocumentFactoryOptions = {}) {
    this.faker = new Faker({ locale: [en] });
    this.minimal = options.minimal ?? false;

    if (options.seed !== undefined) {
      const numericSeed =
        typeof options.seed === "string" ? hashStringToSeed(options.seed) : options.seed;
      this.faker.seed(numericSeed);
      logger.debug("Document factory seeded", { seed: options.seed, numericSeed });
    }
  }

  /**
   * Build the full document stored under `key`
   */
  build(key: DocumentKey): DocumentRecord {
    const now = new Date();
    const base: DocumentRecord = {
      _id: key.id,
      k: key.sequence,
      ts: now,
      n: 0,
      ...(key.location !== undefined ? { location: key.location } : {}),
    };

    if (this.minimal) {
      return { ...base, v: this.faker.string.alphanumeric(16) };
    }

    return { ...base, ...this.payload(key.location, now) };
  }

  /**
   * Fields written by an update
   */
  touch(): { $inc: { n: number }; $set: { ts: Date } } {
    return { $inc: { n: 1 }, $set: { ts: new Date() } };
  }

  private payload(location: string | undefined, now: Date): Record<string, unknown> {
    const f = this.faker;
    const countryCode = location ?? f.location.countryCode("alpha-2");

    const profile: Record<string, unknown> = {
      name: f.person.fullName(),
      email: f.internet.email(),
      company: f.company.name(),
      address: {
        street: f.location.streetAddress(),
        city: f.location.city(),
        state: f.location.state({ abbreviated: true }),
        postalCode: f.location.zipCode(),
        countryCode,
        country: f.location.country(),
        geo: { lat: f.location.latitude(), lng: f.location.longitude() },
      },
    };
    if (f.datatype.boolean(0.5)) {
      profile.job = { title: f.person.jobTitle(), seniority: f.helpers.arrayElement(SENIORITY) };
    }
    if (f.datatype.boolean(0.3)) {
      profile.website = f.internet.url();
    }
    if (f.datatype.boolean(0.3)) {
      profile.birthdate = f.date.birthdate({ min: 18, max: 90, mode: "age" });
    }

    const metadata: Record<string, unknown> = {
      source: f.helpers.arrayElement(SOURCES),
      createdAt: now,
      updatedAt: now,
    };
    if (f.datatype.boolean(0.2)) {
      metadata.note = f.lorem.sentence(8);
    }

    return {
      profile,
      phones: f.helpers.multiple(() => f.phone.number(), { count: { min: 0, max: 3 } }),
      tags: f.helpers.multiple(() => f.lorem.word(), { count: { min: 0, max: 6 } }),
      orders: f.helpers.multiple(() => this.order(now), { count: { min: 0, max: 3 } }),
      preferences: {
        newsletter: f.datatype.boolean(),
        categories: f.helpers.arrayElements(CATEGORIES, { min: 0, max: 4 }),
        timezone: f.location.timeZone(),
      },
      metadata,
      // Union-typed fields
      contact: f.datatype.boolean()
        ? f.internet.email()
        : { email: f.internet.email(), phone: f.phone.number() },
      rating: f.datatype.boolean()
        ? f.number.int({ min: 1, max: 5 })
        : f.number.float({ min: 1, max: 5, fractionDigits: 2 }),
      lastSeen: f.datatype.boolean() ? now : Math.floor(now.getTime() / 1000),
      attrs: {
        a: f.helpers.arrayElement([true, false, null, f.lorem.word(), f.number.int(100)]),
        b: [f.number.int(5), f.lorem.word()],
      },
    };
  }

  private order(now: Date): Record<string, unknown> {
    const f = this.faker;
    const items = f.helpers.multiple(
      () => ({
        sku: f.helpers.replaceSymbols("SKU-????-#####"),
        qty: f.number.int({ min: 1, max: 5 }),
        price: f.number.float({ min: 5, max: 500, fractionDigits: 2 }),
      }),
      { count: { min: 1, max: 3 } },
    );
    const total = items.reduce((sum, item) => sum + item.qty * item.price, 0);

    return {
      id: f.string.uuid(),
      total: Math.round(total * 100) / 100,
      items,
      placedAt: now,
    };
  }
}
