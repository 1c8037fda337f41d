export type TemplateId = "react" | "nextjs" | "t3" | "react-supabase" | "express" | "fastapi" | "python";
export type TemplateCategory = "frontend" | "fullstack" | "backend" | "python";
export type FeatureId = string;
