import { z } from "zod";
import { AuthError, ValidationError } from "../errors.js";
import { MIN_PASSWORD_LENGTH } from "../repositories/user-repository.js";
import type { ToolDefinition } from "./types.js";

const SignUpSchema = z.object({
  email: z.string().describe("Email address"),
  password: z.string().min(MIN_PASSWORD_LENGTH).describe("Password"),
  name: z.string().optional().describe("Display name"),
});

const SignInSchema = z.object({
  email: z.string(),
  password: z.string(),
});

const UpdateNameSchema = z.object({
  name: z.string().describe("New display name; empty clears it"),
});

const DeleteAccountSchema = z.object({
  confirm: z.boolean().describe("Must be true"),
});

export const authTools: ToolDefinition[] = [
  {
    name: "sign_up",
    description: "Create a local account and sign in. Passwords are stored as salted PBKDF2 hashes.",
    inputSchema: {
      type: "object",
      properties: {
        email: { type: "string", description: "Email address" },
        password: { type: "string", description: `Password (min ${MIN_PASSWORD_LENGTH} characters)` },
        name: { type: "string", description: "Display name" },
      },
      required: ["email", "password"],
    },
    handler: async (args, ctx) => {
      const input = SignUpSchema.parse(args);
      await ctx.users.signUp(input.email, input.password, input.name);
      const user = await ctx.users.requireUser();
      return (
        `Account created for **${user.email}**. You are signed in.\n\n` +
        `Next: use set_goals to enter your body data and nutrition targets.`
      );
    },
  },
  {
    name: "sign_in",
    description: "Sign in with email and password.",
    inputSchema: {
      type: "object",
      properties: {
        email: { type: "string", description: "Email address" },
        password: { type: "string", description: "Password" },
      },
      required: ["email", "password"],
    },
    handler: async (args, ctx) => {
      const { email, password } = SignInSchema.parse(args);
      const user = await ctx.users.signIn(email, password);
      if (!user) throw new AuthError("Invalid email or password");
      let text = `Signed in as **${user.name ?? user.email}**.`;
      if (!user.onboardingCompleted) text += `\n\nOnboarding is not complete yet: use set_goals.`;
      return text;
    },
  },
  {
    name: "sign_out",
    description: "Sign out of the local session.",
    inputSchema: { type: "object", properties: {} },
    handler: async (_args, ctx) => {
      await ctx.users.signOut();
      return "Signed out.";
    },
  },
  {
    name: "whoami",
    description: "Show the signed-in user.",
    inputSchema: { type: "object", properties: {} },
    handler: async (_args, ctx) => {
      const user = await ctx.users.currentUser();
      if (!user) return "Not signed in.";
      return (
        `**${user.name ?? "(no name)"}** <${user.email}>\n` +
        `Onboarding: ${user.onboardingCompleted ? "complete" : "pending"}`
      );
    },
  },
  {
    name: "update_profile_name",
    description: "Change the display name of the signed-in user.",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "New display name; empty clears it" },
      },
      required: ["name"],
    },
    handler: async (args, ctx) => {
      const { name } = UpdateNameSchema.parse(args);
      const user = await ctx.users.requireUser();
      const updated = ctx.users.updateName(user.id, name);
      return updated.name ? `Name updated to **${updated.name}**.` : "Name cleared.";
    },
  },
  {
    name: "delete_account",
    description: "Permanently delete the signed-in account and all of its data.",
    inputSchema: {
      type: "object",
      properties: {
        confirm: { type: "boolean", description: "Must be true" },
      },
      required: ["confirm"],
    },
    handler: async (args, ctx) => {
      const { confirm } = DeleteAccountSchema.parse(args);
      if (!confirm) throw new ValidationError("Set confirm to true to delete the account");
      await ctx.users.requireUser();
      const deleted = await ctx.users.deleteAccount();
      return deleted ? "Account deleted. All local data for it has been removed." : "No account to delete.";
    },
  },
];
