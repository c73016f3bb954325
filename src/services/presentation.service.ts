import { CURRENCY_SYMBOL } from "../config/recommendation.config";
import type PhoneRecord from "../models/phone.model";
import type { RecommendationTableRow, ScoredPhone } from "../models/recommendation.model";

const MISSING = "N/A";

export const NO_MATCHES_MESSAGE = "No phones found matching your preferences. Try adjusting filters.";
export const NO_MATCHES_CHAT_REPLY = "Sorry, no phones found matching your criteria. Try changing your filters.";
export const MATCHES_MESSAGE = "Here are your top recommended phones:";

/**
 * Renders ranked phones for the results table, the result cards and the chat box.
 * Both the submit flow and the chat flow format through here.
 */
class PresentationService {

    static roundScore(score: number): number {
        return Math.round(score * 100) / 100;
    }

    static title(phone: PhoneRecord): string {
        return [phone.brand, phone.model].filter(Boolean).join(" ");
    }

    static toTableRow(phone: ScoredPhone): RecommendationTableRow {
        return {
            brand: phone.brand,
            model: phone.model,
            price: phone.price,
            ram: phone.ram,
            battery: phone.battery,
            camera: phone.camera,
            score: this.roundScore(phone.score)
        };
    }

    static toMarkdownBlock(phone: ScoredPhone): string {
        return [
            `**${this.title(phone)}**  `,
            `💰 ${this.formatPrice(phone.price)}  `,
            `⚡ RAM: ${this.formatInteger(phone.ram, " GB")} | 🔋 Battery: ${this.formatInteger(phone.battery, " mAh")} | 📸 Camera: ${phone.camera ?? MISSING}  `,
            `⭐ Score: ${this.roundScore(phone.score)}`
        ].join("\n");
    }

    static toChatLine(phone: ScoredPhone): string {
        return `**${this.title(phone)}** - ${this.formatPrice(phone.price)}` +
            ` | RAM: ${this.formatInteger(phone.ram, "GB")}` +
            ` | Battery: ${this.formatInteger(phone.battery, "mAh")}` +
            ` | Camera: ${phone.camera ?? MISSING}` +
            ` | Score: ${this.roundScore(phone.score)}`;
    }

    static toChatReply(phones: ScoredPhone[]): string {
        if (phones.length === 0) {
            return NO_MATCHES_CHAT_REPLY;
        }
        return phones.map(p => this.toChatLine(p)).join("\n\n");
    }

    private static formatPrice(price: number | null): string {
        return price === null ? MISSING : `${CURRENCY_SYMBOL}${Math.trunc(price)}`;
    }

    private static formatInteger(value: number | null, unit: string): string {
        return value === null ? MISSING : `${Math.trunc(value)}${unit}`;
    }
}

export default PresentationService;
