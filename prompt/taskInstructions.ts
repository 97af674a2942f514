// ─────────────────────────────────────────────────────────────
// Task Instructions — Fixed closing frame of every prompt
//
// Asks the model for two deliverables: a visual slide blueprint
// and a timed narration / caption script.
// ─────────────────────────────────────────────────────────────

/** Narration pace the script timings are based on */
export const NARRATION_WORDS_PER_MINUTE = 150;

export const TASK_INSTRUCTIONS = `# Your task
You are the instructional designer, visual designer and narrator for this e-learning course.
Produce the two parts below, in this order, covering every slide of the course structure above.

## Part 1: Visual slide blueprint
Describe every slide in Markdown using this format. Keep the design modern and easy to follow.

### Unit [unit number]: [unit name]

**Slide [slide number]: [slide title]**
- **Layout**: overall arrangement (e.g. "title on top, one large icon in the center").
- **Key visual**: the main graphic element (e.g. "a simple light-bulb icon").
- **On-slide text**: the exact text shown. Apart from the title, keep to 3-5 short bullets or keywords.
- **Colors**: 2-3 suggested colors (e.g. "calm blue #3366CC, orange accent #FF8C00").

## Part 2: Timed narration and caption script
Write the narration and video captions as a Markdown table.

Rules:
1. **Timing**: assume a narration pace of ${NARRATION_WORDS_PER_MINUTE} words per minute (2.5 words per second) and derive each block's start and end time from its word count.
2. **Captions**: split the narration into short, meaningful blocks. Each caption fits in at most two lines.
3. **Timestamps**: use MM:SS (e.g. 00:08, 02:15).
4. **Research**: where research data is provided, prefer its figures and examples over general knowledge.

| Slide | Start | End | Caption (max 2 lines) | Full narration (spoken style) |
|---|---|---|---|---|
| 1 | 00:00 | 00:05 | Welcome! Today we cover<br>the basics of this course. | Welcome! Today we are going to cover the basics of this course together. |
| ... | ... | ... | ... | ... |`;
