import type { Metadata } from "next";

export const metadata: Metadata = {
  title: "Faculty Rating Analysis",
  description: "Per-subject averages and score distributions from faculty rating survey exports.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
