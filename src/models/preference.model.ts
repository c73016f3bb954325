export type Priority = "Performance" | "Camera" | "Battery" | "Display" | "Balanced";

export interface PreferenceContext {
    budgetMin: number;
    budgetMax: number;
    priority: Priority;
    brandFilter: string[];
    // Reserved: accepted from the user but not interpreted
    requirement?: string;
}
