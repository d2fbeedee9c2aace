import type { ContentMetadata } from '../content/client.js';

export const PROFILE_SYSTEM_PROMPT = 'You are a profile creation specialist.';

function field(value: string | null | undefined, placeholder: string): string {
  return value ?? placeholder;
}

export function buildProfilePrompt(content: ContentMetadata): string {
  return `Based on the following content information, create a detailed social media profile for an AI agent that embodies the author's persona in the context of their work.

Content Details:
Title: ${field(content.title, 'Unknown')}
Author: ${field(content.author, 'Unknown')}
Topic: ${field(content.topic, 'Unknown')}
Genre: ${field(content.genre, 'Unknown')}

Take into account the following custom prompt:
Custom Prompt: ${field(content.custom_prompt, 'None')}

Make all of the below clever, witty, and engaging.

First think about the following:
Who is the author?
What are they writing about?
Describe their tone and writing style.
What is their persona? Their character? Their values? Their worldview?

Then create a profile that includes:
1. A witty display name that reflects the author's persona
2. A full name (if known)
3. A social media bio written in the style of the author (be witty and original)
4. A location related to the author or their work (make it something unique or funny)
5. Detailed system instructions for how this AI should communicate. Describe the tone, style, and personality of the author. Take on the persona of the author and describe to the AI how it should act. For example: "You are Julius Caesar writing De Bello Gallico. Your wording is precise and to the point, and you describe military strategy in detail."

Respond in JSON format with exactly this structure:
{
  "display_name": "Creative display name",
  "name": "Full name",
  "bio": "Detailed biography",
  "location": "Relevant location",
  "systems_instructions": "Detailed instructions for AI communication style"
}`;
}
