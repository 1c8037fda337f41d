import { normalizeContent } from "../text.js";
import type { FeatureDefinition, FileArtifact, GeneratorContext } from "../types.js";
import { REACT_FEATURES, buildReactBaseFiles } from "./react.js";
import { compactArtifacts, hasFeature, scriptExtension } from "./shared.js";

export const REACT_SUPABASE_FEATURES: readonly FeatureDefinition[] = [
  ...REACT_FEATURES,
  { id: "auth", label: "Authentication", description: "Auth context with email/password sign-in", defaultEnabled: false },
  { id: "database", label: "Database helpers", description: "Typed CRUD helpers over Supabase tables", defaultEnabled: false },
  { id: "storage", label: "Storage helpers", description: "Upload, download and public URL helpers", defaultEnabled: false }
];

function buildEnvExample(): string {
  return normalizeContent(`VITE_SUPABASE_URL=your-project-url
VITE_SUPABASE_ANON_KEY=your-anon-key
`);
}

function buildSupabaseClient(context: GeneratorContext): string {
  if (hasFeature(context, "typescript")) {
    return normalizeContent(`import { createClient } from "@supabase/supabase-js";

const supabaseUrl = import.meta.env.VITE_SUPABASE_URL as string;
const supabaseAnonKey = import.meta.env.VITE_SUPABASE_ANON_KEY as string;

export const supabase = createClient(supabaseUrl, supabaseAnonKey);
`);
  }
  return normalizeContent(`import { createClient } from "@supabase/supabase-js";

const supabaseUrl = import.meta.env.VITE_SUPABASE_URL;
const supabaseAnonKey = import.meta.env.VITE_SUPABASE_ANON_KEY;

export const supabase = createClient(supabaseUrl, supabaseAnonKey);
`);
}

function buildAuthContext(context: GeneratorContext): string {
  if (!hasFeature(context, "typescript")) {
    return normalizeContent(`import { createContext, useContext, useEffect, useState } from "react";
import { supabase } from "./supabase";

const AuthContext = createContext({
  user: null,
  signIn: async () => {},
  signOut: async () => {},
});

export function AuthProvider({ children }) {
  const [user, setUser] = useState(null);

  useEffect(() => {
    const {
      data: { subscription },
    } = supabase.auth.onAuthStateChange((_event, session) => {
      setUser(session?.user ?? null);
    });
    return () => subscription.unsubscribe();
  }, []);

  const signIn = async (email, password) => {
    const { error } = await supabase.auth.signInWithPassword({ email, password });
    if (error) throw error;
  };

  const signOut = async () => {
    const { error } = await supabase.auth.signOut();
    if (error) throw error;
  };

  return <AuthContext.Provider value={{ user, signIn, signOut }}>{children}</AuthContext.Provider>;
}

export const useAuth = () => useContext(AuthContext);
`);
  }
  return normalizeContent(`import { createContext, useContext, useEffect, useState, type ReactNode } from "react";
import type { User } from "@supabase/supabase-js";
import { supabase } from "./supabase";

interface AuthState {
  user: User | null;
  signIn: (email: string, password: string) => Promise<void>;
  signOut: () => Promise<void>;
}

const AuthContext = createContext<AuthState>({
  user: null,
  signIn: async () => {},
  signOut: async () => {},
});

export function AuthProvider({ children }: { children: ReactNode }) {
  const [user, setUser] = useState<User | null>(null);

  useEffect(() => {
    const {
      data: { subscription },
    } = supabase.auth.onAuthStateChange((_event, session) => {
      setUser(session?.user ?? null);
    });
    return () => subscription.unsubscribe();
  }, []);

  const signIn = async (email: string, password: string) => {
    const { error } = await supabase.auth.signInWithPassword({ email, password });
    if (error) throw error;
  };

  const signOut = async () => {
    const { error } = await supabase.auth.signOut();
    if (error) throw error;
  };

  return <AuthContext.Provider value={{ user, signIn, signOut }}>{children}</AuthContext.Provider>;
}

export const useAuth = () => useContext(AuthContext);
`);
}

function buildDatabaseHelpers(context: GeneratorContext): string {
  if (!hasFeature(context, "typescript")) {
    return normalizeContent(`import { supabase } from "./supabase";

export async function fetchRows(table, filters = {}) {
  let query = supabase.from(table).select("*");
  for (const [column, value] of Object.entries(filters)) {
    query = query.eq(column, value);
  }
  const { data, error } = await query;
  if (error) throw error;
  return data;
}

export async function insertRow(table, row) {
  const { data, error } = await supabase.from(table).insert(row).select().single();
  if (error) throw error;
  return data;
}

export async function updateRow(table, id, changes) {
  const { data, error } = await supabase.from(table).update(changes).eq("id", id).select().single();
  if (error) throw error;
  return data;
}

export async function deleteRow(table, id) {
  const { error } = await supabase.from(table).delete().eq("id", id);
  if (error) throw error;
}
`);
  }
  return normalizeContent(`import { supabase } from "./supabase";

type Filters = Record<string, string | number | boolean>;

export async function fetchRows<T>(table: string, filters: Filters = {}): Promise<T[]> {
  let query = supabase.from(table).select("*");
  for (const [column, value] of Object.entries(filters)) {
    query = query.eq(column, value);
  }
  const { data, error } = await query;
  if (error) throw error;
  return data as T[];
}

export async function insertRow<T>(table: string, row: Partial<T>): Promise<T> {
  const { data, error } = await supabase.from(table).insert(row).select().single();
  if (error) throw error;
  return data as T;
}

export async function updateRow<T>(table: string, id: string | number, changes: Partial<T>): Promise<T> {
  const { data, error } = await supabase.from(table).update(changes).eq("id", id).select().single();
  if (error) throw error;
  return data as T;
}

export async function deleteRow(table: string, id: string | number): Promise<void> {
  const { error } = await supabase.from(table).delete().eq("id", id);
  if (error) throw error;
}
`);
}

function buildStorageHelpers(context: GeneratorContext): string {
  const typed = hasFeature(context, "typescript");
  const param = (name: string, type: string) => (typed ? `${name}: ${type}` : name);
  const returns = (type: string) => (typed ? `: ${type}` : "");
  return normalizeContent(`import { supabase } from "./supabase";

export async function uploadFile(${param("bucket", "string")}, ${param("path", "string")}, ${param("file", "File")})${returns("Promise<string>")} {
  const { data, error } = await supabase.storage.from(bucket).upload(path, file);
  if (error) throw error;
  return data.path;
}

export async function downloadFile(${param("bucket", "string")}, ${param("path", "string")})${returns("Promise<string>")} {
  const { data, error } = await supabase.storage.from(bucket).download(path);
  if (error) throw error;
  return URL.createObjectURL(data);
}

export async function deleteFile(${param("bucket", "string")}, ${param("path", "string")})${returns("Promise<void>")} {
  const { error } = await supabase.storage.from(bucket).remove([path]);
  if (error) throw error;
}

export function getPublicUrl(${param("bucket", "string")}, ${param("path", "string")})${returns("string")} {
  const { data } = supabase.storage.from(bucket).getPublicUrl(path);
  return data.publicUrl;
}
`);
}

export function generateReactSupabaseProject(context: GeneratorContext): FileArtifact[] {
  const ext = scriptExtension(context);
  const jsxExt = scriptExtension(context, true);
  const base = buildReactBaseFiles(context, {
    summary: "React single-page application built with Vite and backed by Supabase.",
    packageExtras: { dependencies: ["@supabase/supabase-js"] }
  });

  return [
    ...base,
    ...compactArtifacts([
      { path: ".env.example", content: buildEnvExample() },
      { path: `src/supabase.${ext}`, content: buildSupabaseClient(context) },
      hasFeature(context, "auth") ? { path: `src/auth.${jsxExt}`, content: buildAuthContext(context) } : null,
      hasFeature(context, "database") ? { path: `src/db.${ext}`, content: buildDatabaseHelpers(context) } : null,
      hasFeature(context, "storage") ? { path: `src/storage.${ext}`, content: buildStorageHelpers(context) } : null
    ])
  ];
}
