import type {
  Acknowledgment,
  BusinessSettings,
  ParsedEvent,
  ProductMention,
  UrgencyLevel,
} from '../shared/types/index.js';
import { UNKNOWN_SENDER_NAME } from '../shared/types/index.js';
import { renderTemplate } from '../templates/engine.js';

export const MAX_QUESTIONS = 2;

export const ACKNOWLEDGMENT_TEMPLATES = ['acknowledgment.body', 'acknowledgment.closing'] as const;

type AcknowledgmentTemplate = (typeof ACKNOWLEDGMENT_TEMPLATES)[number];

export const QUESTIONS = {
  quantity: (name: string) => `What quantity of ${name} do you need?`,
  productDetails:
    "Could you please provide more details about the specific products you're interested in?",
  contact: 'Could you please confirm your contact information for our records?',
  products: 'What products are you interested in purchasing?',
  delivery: 'Do you have any specific delivery requirements or timeline preferences?',
} as const;

export interface AcknowledgmentGeneratorOptions {
  clock?: () => Date;
}

type AcknowledgmentSettings = Pick<BusinessSettings, 'company_name' | 'contact_email' | 'sla_hours'>;

interface BodyContext {
  urgency: UrgencyLevel | null;
  companyName: string;
  contactEmail: string;
  singleProduct: ProductMention | null;
  productNames: string[];
  gaps: string[];
  firstGap: string | null;
  responseHours: number;
}

/**
 * Builds the acknowledgment sent back to the sender of an inquiry: a
 * subject and greeting tailored to the extraction, a templated body, and up
 * to two follow-up questions derived from the gaps.
 */
export class AcknowledgmentGenerator {
  private readonly settings: AcknowledgmentSettings;
  private readonly clock: () => Date;

  constructor(settings: AcknowledgmentSettings, options: AcknowledgmentGeneratorOptions = {}) {
    this.settings = {
      company_name: settings.company_name,
      contact_email: settings.contact_email,
      sla_hours: settings.sla_hours,
    };
    this.clock = options.clock ?? (() => new Date());
  }

  generate(event: ParsedEvent): Acknowledgment {
    return {
      email_id: event.email_id,
      timestamp: this.clock().toISOString(),
      to: event.sender.email,
      subject: this.buildSubject(event.products, event.urgency),
      greeting: this.buildGreeting(event.sender.name),
      body: this.buildBody(event),
      questions: this.buildQuestions(event.gaps, event.products),
      closing: this.render('acknowledgment.closing', {
        companyName: this.settings.company_name,
        contactEmail: this.settings.contact_email,
      }),
      sla_hours: this.settings.sla_hours,
      urgency_level: event.urgency,
    };
  }

  /**
   * Hours promised for the quote; urgent inquiries get half the SLA
   */
  responseHours(urgency: UrgencyLevel | null): number {
    return urgency === 'high' ? Math.floor(this.settings.sla_hours / 2) : this.settings.sla_hours;
  }

  private buildSubject(products: readonly ProductMention[], urgency: UrgencyLevel | null): string {
    if (products.length === 0) {
      return 'Re: Your Inquiry - Additional Information Needed';
    }

    let subject: string;
    if (products.length === 1) {
      subject = `Re: ${products[0].name} Quote Request`;
    } else if (products.length === 2) {
      subject = `Re: ${products[0].name} and ${products[1].name} Quote Request`;
    } else {
      subject = `Re: Quote Request for ${products.length} Items`;
    }

    if (urgency === 'high') return `${subject} - URGENT`;
    if (urgency === 'medium') return `${subject} - Priority`;
    return subject;
  }

  private buildGreeting(name: string): string {
    return name && name !== UNKNOWN_SENDER_NAME ? `Dear ${name},` : 'Dear Valued Customer,';
  }

  private buildBody(event: ParsedEvent): string {
    const context: BodyContext = {
      urgency: event.urgency,
      companyName: this.settings.company_name,
      contactEmail: this.settings.contact_email,
      singleProduct: event.products.length === 1 ? event.products[0] : null,
      productNames: event.products.map((p) => p.name),
      gaps: event.gaps,
      firstGap: event.gaps.length > 0 ? event.gaps[0] : null,
      responseHours: this.responseHours(event.urgency),
    };

    return this.render('acknowledgment.body', context);
  }

  private buildQuestions(gaps: readonly string[], products: readonly ProductMention[]): string[] {
    const questions: string[] = [];
    const asked = new Set<ProductMention>();

    for (const gap of gaps) {
      if (questions.length >= MAX_QUESTIONS) break;

      const lower = gap.toLowerCase();
      if (lower.includes('quantity')) {
        const product = products.find((p) => p.quantity === null && !asked.has(p));
        if (product) {
          asked.add(product);
          questions.push(QUESTIONS.quantity(product.name));
        }
      } else if (lower.includes('product') && lower.includes('unrecognized')) {
        questions.push(QUESTIONS.productDetails);
      } else if (lower.includes('sender')) {
        questions.push(QUESTIONS.contact);
      }
    }

    if (questions.length === 0) {
      if (products.length === 0) {
        questions.push(QUESTIONS.products);
      }
      questions.push(QUESTIONS.delivery);
    }

    return questions.slice(0, MAX_QUESTIONS);
  }

  private render(templateName: AcknowledgmentTemplate, context: object): string {
    return renderTemplate(templateName, context)
      .replace(/\n{3,}/g, '\n\n')
      .trim();
  }
}
