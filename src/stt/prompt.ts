export const TRANSCRIPTION_PROMPT = `
Transcribe this audio accurately. When the speaker says an email address, phone number, postal address or similar detail, transcribe it carefully and normalize it to its standard written form.

Examples:

An email spelled out with spaces, letters or capitals (for example "J O H N 42 at EXAMPLE dot COM" or "John 42 @ Example.com") becomes lowercase with no spaces: john42@example.com.

A phone number read digit by digit or with pauses (for example "zero two zero seven nine four six zero zero one") becomes one continuous number: 02079460001.

Speakers often have Arabic or Indian English accents; pay attention to accent-related pronunciation when transcribing and normalizing details. Do not include timestamps or speaker labels in the transcription.`.trim();
